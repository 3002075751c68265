import { z } from 'zod';
import type { LatestVersionInfo } from '@shared/contracts';

const latestVersionInfoSchema = z.object({
  versionMajor: z.number().int().nonnegative(),
  versionMinor: z.number().int().nonnegative(),
  downloadUrl: z.string().url(),
  releaseUrl: z.string().url(),
  sha256: z.string().regex(/^[a-fA-F0-9]{64}$/, 'sha256 must be a 64-char hex SHA256'),
  releaseNotes: z.string().default(''),
  publishedAt: z.string().datetime({ offset: true }).nullable().default(null)
});

export class LatestVersionInfoValidator {
  validate(input: unknown): { ok: true; versionInfo: LatestVersionInfo } | { ok: false; error: string } {
    const parsed = latestVersionInfoSchema.safeParse(input);
    if (!parsed.success) {
      return {
        ok: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      };
    }

    return {
      ok: true,
      versionInfo: Object.freeze({ ...parsed.data, sha256: parsed.data.sha256.toLowerCase() })
    };
  }
}
