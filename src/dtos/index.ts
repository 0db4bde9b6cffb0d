export * from './common';
export * from './slot.dto';
export * from './booking.dto';
export * from './auth.dto';
export * from './user.dto';
export * from './configuration.dto';
