import type { RefreshTokenService } from '../../services/refresh-token-service.js';
import type { GrantHandler } from '../token-request.js';
import { assertGrantAllowed, parseTokenParams, refreshTokenParamsSchema } from '../token-request.js';
import { GRANT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

export interface RefreshTokenHandlerOptions {
  refreshTokens: RefreshTokenService;
}

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6. Rotation and replay handling live in the refresh token service.
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions): GrantHandler {
  const { refreshTokens } = options;

  return async (client, params) => {
    assertGrantAllowed(client, GRANT_TYPE_REFRESH_TOKEN);

    const { refresh_token, scope } = parseTokenParams(refreshTokenParamsSchema, params);

    return refreshTokens.refresh(client, { refreshToken: refresh_token, scope });
  };
}
