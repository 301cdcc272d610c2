/**
 * Security Middleware
 * Request shape limits, response security headers and rate limiting for the API
 */

import { Request, Response, NextFunction } from 'express';
import { rateLimit, RateLimitRequestHandler } from 'express-rate-limit';
import { Logger, silentLogger } from '../../content-engine/utils/logger.js';

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  skipSuccessfulRequests: boolean;
}

export interface SecurityConfig {
  globalRateLimit: RateLimitConfig;

  // Starting a run costs LLM calls; polling does not
  generationRateLimit: RateLimitConfig;

  // Request validation
  validation: {
    allowedContentTypes: string[];
    maxHeaderSize: number;
    maxUrlLength: number;
    maxUserIdLength: number;
  };

  // Security headers
  headers: {
    enableHSTS: boolean;
    enableFrameDeny: boolean;
  };
}

export interface SecurityViolation {
  type: 'rate_limit' | 'invalid_request';
  ip: string;
  path: string;
  timestamp: number;
  details: string;
}

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  globalRateLimit: {
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 1000, // requests per window
    skipSuccessfulRequests: false
  },

  generationRateLimit: {
    windowMs: 60 * 1000,
    max: 10,
    skipSuccessfulRequests: false
  },

  validation: {
    allowedContentTypes: ['application/json', 'application/x-www-form-urlencoded', 'text/plain'],
    maxHeaderSize: 8192, // 8KB
    maxUrlLength: 2048,
    maxUserIdLength: 128
  },

  headers: {
    enableHSTS: false,
    enableFrameDeny: true
  }
};

export class SecurityMiddleware {
  private config: SecurityConfig;
  private logger: Logger;

  constructor(config: Partial<SecurityConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_SECURITY_CONFIG, ...config };
    this.logger = logger || silentLogger;
  }

  /**
   * Rejects oversized or mistyped requests, then sets the security headers
   */
  securityMiddleware() {
    return (req: Request, res: Response, next: NextFunction): void => {
      const validationResult = this.validateRequest(req);
      if (!validationResult.valid) {
        this.logViolation({
          type: 'invalid_request',
          ip: this.getClientIP(req),
          path: req.path,
          timestamp: Date.now(),
          details: validationResult.reason
        });
        res.status(400).json({ success: false, error: validationResult.reason });
        return;
      }

      this.setSecurityHeaders(res);
      next();
    };
  }

  createRateLimit(options?: Partial<RateLimitConfig>): RateLimitRequestHandler {
    const config = { ...this.config.globalRateLimit, ...options };
    return this.buildRateLimit(config);
  }

  createGenerationRateLimit(): RateLimitRequestHandler {
    return this.buildRateLimit(this.config.generationRateLimit);
  }

  private buildRateLimit(config: RateLimitConfig): RateLimitRequestHandler {
    const retryAfter = Math.ceil(config.windowMs / 1000);

    return rateLimit({
      windowMs: config.windowMs,
      max: config.max,
      skipSuccessfulRequests: config.skipSuccessfulRequests,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req: Request, res: Response) => {
        this.logViolation({
          type: 'rate_limit',
          ip: this.getClientIP(req),
          path: req.path,
          timestamp: Date.now(),
          details: 'Rate limit exceeded'
        });

        res.status(429).json({
          success: false,
          error: 'Too many requests',
          retryAfter
        });
      }
    });
  }

  private validateRequest(req: Request): { valid: true } | { valid: false; reason: string } {
    if (req.url.length > this.config.validation.maxUrlLength) {
      return { valid: false, reason: 'URL too long' };
    }

    if (['POST', 'PUT', 'PATCH'].includes(req.method)) {
      const contentType = req.get('content-type');
      if (contentType && !this.config.validation.allowedContentTypes.some(allowed =>
        contentType.toLowerCase().includes(allowed)
      )) {
        return { valid: false, reason: 'Invalid content type' };
      }
    }

    // Approximate
    const headerSize = JSON.stringify(req.headers).length;
    if (headerSize > this.config.validation.maxHeaderSize) {
      return { valid: false, reason: 'Headers too large' };
    }

    const userId = req.get('X-User-ID');
    if (userId && userId.length > this.config.validation.maxUserIdLength) {
      return { valid: false, reason: 'Invalid X-User-ID header' };
    }

    return { valid: true };
  }

  private setSecurityHeaders(res: Response): void {
    if (this.config.headers.enableHSTS) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }

    if (this.config.headers.enableFrameDeny) {
      res.setHeader('X-Frame-Options', 'DENY');
    }

    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
  }

  private getClientIP(req: Request): string {
    const forwarded = req.get('X-Forwarded-For') || req.get('X-Real-IP') || req.socket.remoteAddress || 'unknown';
    return forwarded.split(',')[0]?.trim() || 'unknown';
  }

  private logViolation(violation: SecurityViolation): void {
    this.logger('warn', 'Security violation detected', { ...violation });
  }
}
