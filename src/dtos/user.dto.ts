import { z } from 'zod';

import { idSchema, isoDateTimeSchema, userRoleSchema } from './common';

export const userResourceSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  email: z.string(),
  role: userRoleSchema,
  superAdmin: z.boolean(),
  blocked: z.boolean(),
  createdAt: isoDateTimeSchema
});

export const userParamsSchema = z.object({
  userId: idSchema
});

export const changeRoleBodySchema = z.object({
  role: userRoleSchema
});

/** `toggle` flips the current state. */
export const blockUserBodySchema = z.object({
  blocked: z.union([z.boolean(), z.literal('toggle')])
});

export type UserResource = z.infer<typeof userResourceSchema>;
export type UserParams = z.infer<typeof userParamsSchema>;
export type ChangeRoleBody = z.infer<typeof changeRoleBodySchema>;
export type BlockUserBody = z.infer<typeof blockUserBodySchema>;
