import bcrypt from 'bcryptjs';

/**
 * Hash a password with bcrypt
 * @param password - Plain text password
 * @param rounds - bcrypt cost factor
 * @returns bcrypt hash including salt and cost
 */
export const hashPassword = async (password: string, rounds: number): Promise<string> => {
  return bcrypt.hash(password, rounds);
};

/**
 * Compare a plain text password with a stored bcrypt hash
 * @returns true if the password matches
 */
export const verifyPassword = async (password: string, passwordHash: string): Promise<boolean> => {
  return bcrypt.compare(password, passwordHash);
};
