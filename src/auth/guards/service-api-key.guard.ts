import {
  Injectable,
  CanActivate,
  ExecutionContext,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { AllConfigType } from '../../config/config.type';

interface RequestWithHeaders {
  headers: Record<string, string | string[] | undefined>;
}

/**
 * Service API Key Guard for write endpoints
 *
 * Summaries are produced by upstream pipeline jobs, not end users, so
 * writes are authenticated with a shared service key in the
 * Authorization header.
 *
 * HIPAA Compliance:
 * - Never log the API key value
 * - Reject every write when no key is configured
 */
@Injectable()
export class ServiceApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ServiceApiKeyGuard.name);

  constructor(private configService: ConfigService<AllConfigType>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<RequestWithHeaders>();
    const authHeader = request.headers.authorization;

    if (typeof authHeader !== 'string' || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedException('Missing or invalid service API key');
    }

    const providedKey = authHeader.substring(7); // Remove 'Bearer '
    const expectedKey = this.configService.get('auth.serviceApiKey', {
      infer: true,
    });

    if (!expectedKey) {
      this.logger.warn(
        '[SERVICE AUTH] SERVICE_API_KEY is not configured; rejecting write request',
      );
      throw new UnauthorizedException('Service API key is not configured');
    }

    const provided = Buffer.from(providedKey);
    const expected = Buffer.from(expectedKey);
    if (
      provided.length !== expected.length ||
      !timingSafeEqual(provided, expected)
    ) {
      throw new UnauthorizedException('Invalid service API key');
    }

    return true;
  }
}
