import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

/**
 * Rejects plain-HTTP requests in production
 *
 * Development and test traffic passes through untouched. Behind a load
 * balancer the X-Forwarded-Proto header decides whether the original
 * request was HTTPS.
 */
@Injectable()
export class HttpsEnforcementMiddleware implements NestMiddleware {
  constructor(private configService: ConfigService<AllConfigType>) {}

  use(req: Request, res: Response, next: NextFunction) {
    const nodeEnv = this.configService.get('app.nodeEnv', { infer: true });

    if (nodeEnv === 'production') {
      const isHttps =
        req.secure ||
        req.protocol === 'https' ||
        req.get('x-forwarded-proto') === 'https';

      if (!isHttps) {
        // The load balancer owns the HTTP->HTTPS redirect
        res.status(403).json({
          statusCode: 403,
          message:
            'HTTPS is required for all requests in production. Please use HTTPS.',
          error: 'Forbidden',
        });
        return;
      }
    }

    next();
  }
}
