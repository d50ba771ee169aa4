import { describe, it, expect } from 'vitest';

import { parseIssueTokenArgs } from '../../../../src/shared/session/issue-token.args';

describe('parseIssueTokenArgs', () => {
  it('--user <uuid> issues a user principal', () => {
    expect(parseIssueTokenArgs(['--user', '11111111-1111-4111-8111-111111111111'])).toEqual({
      kind: 'user',
      userId: '11111111-1111-4111-8111-111111111111',
    });
  });

  it('--service <name> issues a service principal', () => {
    expect(parseIssueTokenArgs(['--service', 'ops-cron'])).toEqual({
      kind: 'service',
      serviceName: 'ops-cron',
    });
  });

  it.each([[[]], [['--user', 'not-a-uuid']], [['--user', '11111111-1111-4111-8111-111111111111', '--service', 'ops']]])(
    'rejects %j',
    (argv) => {
      expect(() => parseIssueTokenArgs(argv)).toThrow(
        'Pass exactly one of --user <uuid> or --service <name>',
      );
    },
  );
});
