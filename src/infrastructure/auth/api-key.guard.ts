import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from './public.decorator';

interface KeyedRequest {
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
}

/**
 * Valida el header x-api-key contra la variable API_KEY.
 *
 * Todos los endpoints son protegidos por defecto; @Public() excluye uno.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(
    private readonly config: ConfigService,
    private readonly reflector: Reflector,
  ) {
    this.apiKey = this.config.get<string>('API_KEY', '');
    if (!this.apiKey) {
      this.logger.warn('⚠️  API_KEY no configurada — se rechazará todo salvo /contacts/health.');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context.switchToHttp().getRequest<KeyedRequest>();
    const header = request.headers['x-api-key'];
    const key = Array.isArray(header) ? header[0] : header;

    if (!this.apiKey) {
      throw new UnauthorizedException('API_KEY no configurada en el servidor');
    }
    if (!key) {
      throw new UnauthorizedException('Header x-api-key requerido');
    }
    if (!this.matches(key)) {
      this.logger.warn(`🚫 API Key inválida desde ${request.ip ?? 'desconocido'}`);
      throw new UnauthorizedException('API Key inválida');
    }

    return true;
  }

  /** Comparación en tiempo constante */
  private matches(key: string): boolean {
    const given = Buffer.from(key);
    const expected = Buffer.from(this.apiKey);
    return given.length === expected.length && timingSafeEqual(given, expected);
  }
}
