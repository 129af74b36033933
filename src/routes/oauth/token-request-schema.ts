import { z } from 'zod';
import { OAuthError } from '../../errors/oauth-error.js';

/**
 * Form body shared by the introspection and revocation endpoints
 */
export const tokenRequestSchema = z.object({
  token: z
    .string({ required_error: 'Missing token parameter' })
    .min(1, 'Missing token parameter'),
  token_type_hint: z.string().optional(),
});

/**
 * zValidator hook turning a failed parse into invalid_request
 */
export function invalidRequestHook(result: { success: boolean; error?: z.ZodError }): void {
  if (!result.success) {
    throw OAuthError.invalidRequest(
      result.error?.issues.map((issue) => issue.message).join('; ') ?? 'Invalid request'
    );
  }
}
