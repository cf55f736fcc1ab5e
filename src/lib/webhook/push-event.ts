import { z } from 'zod';

const PushPayloadSchema = z.object({
  ref: z.string().min(1),
  after: z.string().optional(),
  deleted: z.boolean().optional(),
  head_commit: z.object({ id: z.string() }).nullable().optional(),
});

const ZERO_SHA = /^0+$/;

export type PushEventDecision =
  | { trigger: true; ref: string; commit?: string }
  | {
      trigger: false;
      reason: 'invalid_payload' | 'branch_deleted' | 'branch_mismatch';
      ref?: string;
    };

/**
 * Decide whether a push payload should start a pipeline run: only pushes
 * to `refs/heads/<deployBranch>` do, and a branch deletion never does.
 */
export function evaluatePushEvent(
  payload: unknown,
  deployBranch: string,
): PushEventDecision {
  const parsed = PushPayloadSchema.safeParse(payload);

  if (!parsed.success) {
    return { trigger: false, reason: 'invalid_payload' };
  }

  const { ref, after, deleted, head_commit: headCommit } = parsed.data;

  if (deleted === true || (after !== undefined && ZERO_SHA.test(after))) {
    return { trigger: false, reason: 'branch_deleted', ref };
  }

  if (ref !== `refs/heads/${deployBranch}`) {
    return { trigger: false, reason: 'branch_mismatch', ref };
  }

  return { trigger: true, ref, commit: headCommit?.id ?? after };
}
