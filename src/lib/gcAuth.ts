import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../logger';

// Refresh this long before the provider-declared expiry.
const TOKEN_BUFFER_SECONDS = 60;

const tokenResponseSchema = z.object({
  access: z.string(),
  access_expires: z.number(),
  refresh: z.string(),
  refresh_expires: z.number(),
});

const refreshResponseSchema = z.object({
  access: z.string(),
  access_expires: z.number(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;
export type RefreshResponse = z.infer<typeof refreshResponseSchema>;

export interface Credentials {
  secretId: string;
  secretKey: string;
}

/**
 * Process-wide token pair. Expiries are lifetimes in seconds as declared by
 * the provider, counted from the matching `*IssuedAt` instant (epoch ms).
 */
export interface TokenState {
  access: string;
  accessExpires: number;
  accessIssuedAt: number;
  refresh: string;
  refreshExpires: number;
  refreshIssuedAt: number;
}

export function createHttpClient(baseUrl: string): AxiosInstance {
  return axios.create({
    baseURL: baseUrl,
    headers: {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
    },
    timeout: 30000,
  });
}

export class GoCardlessAuth {
  private state: TokenState | null = null;

  constructor(
    private readonly http: AxiosInstance,
    private readonly credentials: Credentials,
    private readonly now: () => number = Date.now
  ) {}

  get token(): Readonly<TokenState> | null {
    return this.state;
  }

  /**
   * Generate a new access/refresh pair from the secret id and key
   */
  async generateToken(): Promise<TokenResponse> {
    try {
      const response = await this.http.post('/api/v2/token/new/', {
        secret_id: this.credentials.secretId,
        secret_key: this.credentials.secretKey,
      });
      const token = tokenResponseSchema.parse(response.data);
      const issuedAt = this.now();

      this.state = {
        access: token.access,
        accessExpires: token.access_expires,
        accessIssuedAt: issuedAt,
        refresh: token.refresh,
        refreshExpires: token.refresh_expires,
        refreshIssuedAt: issuedAt,
      };

      logger.debug(
        { accessExpires: token.access_expires, refreshExpires: token.refresh_expires },
        'Generated new GoCardless token'
      );
      return token;
    } catch (err) {
      logger.error({ err }, 'Failed to generate GoCardless token');
      throw err;
    }
  }

  /**
   * Renew the access token. The refresh token is not rotated.
   */
  async exchangeToken(refreshToken: string): Promise<RefreshResponse> {
    try {
      const response = await this.http.post('/api/v2/token/refresh/', {
        refresh: refreshToken,
      });
      const token = refreshResponseSchema.parse(response.data);

      if (this.state) {
        this.state = {
          ...this.state,
          access: token.access,
          accessExpires: token.access_expires,
          accessIssuedAt: this.now(),
        };
      }

      logger.debug({ accessExpires: token.access_expires }, 'Exchanged GoCardless token');
      return token;
    } catch (err) {
      logger.error({ err }, 'Failed to exchange GoCardless token');
      throw err;
    }
  }

  /**
   * Bring the token pair up to date: keep a fresh access token, exchange a
   * stale one while the refresh token lasts, otherwise start over.
   */
  async refreshToken(): Promise<void> {
    if (!this.state) {
      await this.generateToken();
      return;
    }

    const now = this.now();
    const accessAge = (now - this.state.accessIssuedAt) / 1000;
    const refreshAge = (now - this.state.refreshIssuedAt) / 1000;

    if (accessAge <= this.state.accessExpires - TOKEN_BUFFER_SECONDS) {
      logger.debug('Access token still valid');
      return;
    }

    if (refreshAge > this.state.refreshExpires - TOKEN_BUFFER_SECONDS) {
      await this.generateToken();
      logger.debug('Refresh token expired, generated a new token pair');
    } else {
      await this.exchangeToken(this.state.refresh);
      logger.debug('Exchanged access token using the refresh token');
    }
  }

  /**
   * Current access token, generating the first pair on demand
   */
  async getAccessToken(): Promise<string> {
    if (!this.state) {
      const token = await this.generateToken();
      return token.access;
    }
    return this.state.access;
  }
}
