import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

const KEY_LENGTH = 64;

function deriveKey(plain: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(plain, salt, KEY_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error);
      } else {
        resolve(derivedKey);
      }
    });
  });
}

export async function hashPassword(plain: string): Promise<string> {
  const salt = randomBytes(16).toString('hex');
  const derivedKey = await deriveKey(plain, salt);
  return `${salt}:${derivedKey.toString('hex')}`;
}

export async function verifyPassword(plain: string, hashed: string): Promise<boolean> {
  const [salt, hash] = hashed.split(':');
  if (!salt || !hash) return false;

  const expected = Buffer.from(hash, 'hex');
  const candidate = await deriveKey(plain, salt);
  return expected.length === candidate.length && timingSafeEqual(candidate, expected);
}
