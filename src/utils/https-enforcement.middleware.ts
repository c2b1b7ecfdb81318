import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

/**
 * Refuses plain-HTTP requests in production. Behind a proxy,
 * X-Forwarded-Proto is trusted.
 */
@Injectable()
export class HttpsEnforcementMiddleware implements NestMiddleware {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const nodeEnv = this.configService.get('app.nodeEnv', { infer: true });

    if (nodeEnv === 'production') {
      const isHttps =
        req.secure ||
        req.protocol === 'https' ||
        req.get('x-forwarded-proto') === 'https';

      if (!isHttps) {
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
