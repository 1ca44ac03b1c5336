import { z } from 'zod';
import { UserRole } from '../db/types';
import { formField } from '../utils/form';

const MIN_PASSWORD_LENGTH = 6;

export interface RegistrationInput {
  username: string;
  password: string;
  confirm: string;
  role: string;
}

export type RegistrationValidation =
  | { ok: true; data: { username: string; password: string; role: UserRole } }
  | { ok: false; errors: string[]; data: RegistrationInput };

const registrationSchema = z
  .object({
    username: z.string().min(1, 'Username is required.'),
    password: z.string().min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters.`),
    confirm: z.string(),
    role: z.enum(['admin', 'staff'], {
      errorMap: () => ({ message: 'Role must be admin or staff.' }),
    }),
  })
  .refine((input) => input.password === input.confirm, { message: 'Passwords do not match.', path: ['confirm'] });

export const readRegistrationForm = (body: unknown): RegistrationInput => ({
  username: formField(body, 'username').trim(),
  password: formField(body, 'password'),
  confirm: formField(body, 'confirm'),
  role: formField(body, 'role') || 'staff',
});

export const validateRegistration = (input: RegistrationInput): RegistrationValidation => {
  const result = registrationSchema.safeParse(input);
  if (result.success) {
    const { username, password, role } = result.data;
    return { ok: true, data: { username, password, role } };
  }
  return { ok: false, errors: result.error.issues.map((issue) => issue.message), data: input };
};
