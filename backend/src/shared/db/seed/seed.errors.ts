/**
 * backend/src/shared/db/seed/seed.errors.ts
 *
 * RULES:
 * - Seeding outside development is an operator mistake, not a client error:
 *   INTERNAL, with the environment in the message.
 */

import { AppError } from '../../http/errors';

export const SeedErrors = {
  environmentNotAllowed(nodeEnv: string) {
    return AppError.internal(
      `Dev seed refused: NODE_ENV is "${nodeEnv}", seeding is only allowed in development.`,
      { nodeEnv },
    );
  },
} as const;
