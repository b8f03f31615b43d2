import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

/**
 * Rejects plain-HTTP requests in production
 *
 * HIPAA Requirement: summaries carry PHI and must be encrypted in transit.
 * Behind a load balancer the X-Forwarded-Proto header decides.
 */
@Injectable()
export class HttpsEnforcementMiddleware implements NestMiddleware {
  constructor(private configService: ConfigService<AllConfigType>) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const nodeEnv = this.configService.get('app.nodeEnv', { infer: true });

    if (nodeEnv === 'production') {
      const isHttps =
        req.secure ||
        req.protocol === 'https' ||
        req.get('x-forwarded-proto') === 'https';

      if (!isHttps) {
        // 403 rather than a redirect; the load balancer owns redirects
        res.status(403).json({
          statusCode: 403,
          message: 'HTTPS is required for all requests in production.',
          error: 'Forbidden',
        });
        return;
      }
    }

    next();
  }
}
