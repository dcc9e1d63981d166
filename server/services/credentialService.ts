import bcrypt from "bcryptjs";
import { ValidationError } from "../errors";
import { logger } from "../logger";

export interface CredentialService {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export function createCredentialService(options: { rounds: number }): CredentialService {
  const { rounds } = options;

  return {
    async hash(password: string): Promise<string> {
      if (password.length === 0) {
        throw new ValidationError("Password must not be empty", [
          { path: "password", message: "Password must not be empty" },
        ]);
      }
      return await bcrypt.hash(password, rounds);
    },

    async verify(password: string, hash: string): Promise<boolean> {
      try {
        return await bcrypt.compare(password, hash);
      } catch (error) {
        // Malformed hashes end up here; a failed check is the answer either way.
        logger.warn('[Credentials] Password comparison failed', {
          reason: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    },
  };
}
