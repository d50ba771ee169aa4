/**
 * backend/src/shared/session/issue-token.args.ts
 *
 * Argument parsing for the token:issue script, kept apart so it can be tested
 * without connecting to Redis.
 *
 * Usage:
 *   npm run token:issue -- --user <uuid>
 *   npm run token:issue -- --service <name>
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';

import type { SessionPrincipal } from './session.types';

const IssueTokenArgsSchema = z.union([
  z.object({ user: z.string().uuid(), service: z.undefined() }),
  z.object({ user: z.undefined(), service: z.string().min(1) }),
]);

export function parseIssueTokenArgs(argv: string[]): SessionPrincipal {
  const { values } = parseArgs({
    args: argv,
    options: {
      user: { type: 'string' },
      service: { type: 'string' },
    },
    strict: true,
  });

  const parsed = IssueTokenArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new Error('Pass exactly one of --user <uuid> or --service <name>');
  }

  return parsed.data.user !== undefined
    ? { kind: 'user', userId: parsed.data.user }
    : { kind: 'service', serviceName: parsed.data.service };
}
