import { z } from 'zod';

const flag = z.union([z.boolean(), z.number()]).transform((v) => v === true || v === 1);

// sqlite hands back the JSON column as text, pg as a parsed array
const roles = z.preprocess(
  (v) => (typeof v === 'string' ? JSON.parse(v) : v),
  z.array(z.string()),
);

export const UserSchema = z.object({
  id: z.string().uuid(),
  username: z.string(),
  email: z.string().email(),
  password_hash: z.string(),
  roles,
  email_verified: flag,
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export type User = z.infer<typeof UserSchema>;

export const RegisterInput = z.object({
  username: z.string().trim().min(3).max(64).regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, _ . -'),
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(8, 'Password must be at least 8 characters'),
});

export type RegisterInput = z.infer<typeof RegisterInput>;

/** Public projection; never includes the password hash. */
export function toPublicUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    roles: user.roles,
    email_verified: user.email_verified,
  };
}
