import { describe, expect, test } from 'vitest';
import { evaluatePushEvent } from './push-event';

describe('evaluatePushEvent', () => {
  test('a push to the deploy branch triggers', () => {
    expect(
      evaluatePushEvent(
        {
          ref: 'refs/heads/main',
          after: '9fceb02d0ae598e95dc970b74767f19372d61af8',
          head_commit: { id: '9fceb02d0ae598e95dc970b74767f19372d61af8' },
        },
        'main',
      ),
    ).toEqual({
      trigger: true,
      ref: 'refs/heads/main',
      commit: '9fceb02d0ae598e95dc970b74767f19372d61af8',
    });
  });

  test('falls back to `after` when there is no head commit', () => {
    expect(
      evaluatePushEvent(
        { ref: 'refs/heads/main', after: 'a1b2c3d', head_commit: null },
        'main',
      ),
    ).toEqual({ trigger: true, ref: 'refs/heads/main', commit: 'a1b2c3d' });
  });

  test('other branches are ignored', () => {
    expect(
      evaluatePushEvent({ ref: 'refs/heads/feature/login' }, 'main'),
    ).toEqual({
      trigger: false,
      reason: 'branch_mismatch',
      ref: 'refs/heads/feature/login',
    });
  });

  test('tags with the branch name are ignored', () => {
    expect(evaluatePushEvent({ ref: 'refs/tags/main' }, 'main')).toMatchObject({
      trigger: false,
      reason: 'branch_mismatch',
    });
  });

  test('branch deletions are ignored', () => {
    expect(
      evaluatePushEvent({ ref: 'refs/heads/main', deleted: true }, 'main'),
    ).toEqual({ trigger: false, reason: 'branch_deleted', ref: 'refs/heads/main' });

    expect(
      evaluatePushEvent(
        {
          ref: 'refs/heads/main',
          after: '0000000000000000000000000000000000000000',
        },
        'main',
      ),
    ).toMatchObject({ trigger: false, reason: 'branch_deleted' });
  });

  test('payloads without a ref are invalid', () => {
    expect(evaluatePushEvent({ zen: 'Keep it simple.' }, 'main')).toEqual({
      trigger: false,
      reason: 'invalid_payload',
    });
    expect(evaluatePushEvent(null, 'main')).toEqual({
      trigger: false,
      reason: 'invalid_payload',
    });
  });
});
