import bcrypt from 'bcrypt';
import { config } from '../config/env';

export const hashPassword = (plain: string) => bcrypt.hash(plain, config.passwordSaltRounds);

export const verifyPassword = (plain: string, hash: string) => bcrypt.compare(plain, hash);
