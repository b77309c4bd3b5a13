import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

/**
 * Protege PUT /update cuando UPDATE_API_TOKEN está configurado.
 * Sin esa variable el endpoint queda abierto.
 */
@Injectable()
export class UpdateTokenGuard implements CanActivate {
  private readonly logger = new Logger(UpdateTokenGuard.name);

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const validToken = this.configService.get<string>('UPDATE_API_TOKEN')?.trim();
    if (!validToken) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const authHeader = request.headers.authorization;

    if (!authHeader) {
      this.logger.warn('Intento de acceso sin token de autorización');
      throw new UnauthorizedException(
        'Authorization token required. Send the header: Authorization: Bearer <token>',
      );
    }

    // Acepta "Bearer <token>" o el token solo
    const token = authHeader.replace(/^Bearer\s+/i, '').trim();

    if (token !== validToken) {
      this.logger.warn('Intento de acceso con token inválido');
      throw new UnauthorizedException('Invalid authorization token');
    }

    return true;
  }
}
