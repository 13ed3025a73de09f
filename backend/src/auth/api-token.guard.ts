import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { createHash, timingSafeEqual } from 'crypto';
import type { FastifyRequest } from 'fastify';
import { APP_CONFIG } from '../config/app.constants';
import type { AppConfig } from '../config/app.config';

/**
 * Accepts `Authorization: Bearer <token>` when the token is one of
 * `API_TOKENS`. With no tokens configured every request is refused.
 */
@Injectable()
export class ApiTokenGuard implements CanActivate {
  private readonly logger = new Logger(ApiTokenGuard.name);
  private readonly digests: Buffer[];

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.digests = config.apiTokens.map((token) => this.digest(token));
    if (!this.digests.length) {
      this.logger.warn(
        'API_TOKENS is empty; every customer request will be rejected with 401.',
      );
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const token = this.readBearerToken(request.headers.authorization);
    if (!token || !this.isAccepted(token)) {
      throw new UnauthorizedException({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'A valid bearer token is required.',
      });
    }
    return true;
  }

  private readBearerToken(header: string | undefined): string | null {
    if (!header) {
      return null;
    }
    const [scheme, token] = header.trim().split(/\s+/, 2);
    if (scheme?.toLowerCase() !== 'bearer' || !token) {
      return null;
    }
    return token;
  }

  private isAccepted(token: string): boolean {
    const candidate = this.digest(token);
    return this.digests.some((digest) => timingSafeEqual(digest, candidate));
  }

  // Equal-length digests keep timingSafeEqual from throwing on length.
  private digest(token: string): Buffer {
    return createHash('sha256').update(token).digest();
  }
}
