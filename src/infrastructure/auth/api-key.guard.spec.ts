import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ContactsController } from '../http/controllers/contacts.controller';
import { ApiKeyGuard } from './api-key.guard';

function contextFor(handler: string, headers: Record<string, string | string[]> = {}): ExecutionContextHost {
  const request = { headers, ip: '127.0.0.1' };
  const method = handler === 'health' ? ContactsController.prototype.health : ContactsController.prototype.runBatch;
  return new ExecutionContextHost([request], ContactsController, method);
}

describe('ApiKeyGuard', () => {
  const guard = new ApiKeyGuard(new ConfigService({ API_KEY: 'test-secret' }), new Reflector());

  it('deja pasar la key correcta', () => {
    expect(guard.canActivate(contextFor('runBatch', { 'x-api-key': 'test-secret' }))).toBe(true);
  });

  it('rechaza requests sin key o con key incorrecta', () => {
    expect(() => guard.canActivate(contextFor('runBatch'))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(contextFor('runBatch', { 'x-api-key': 'wrong' }))).toThrow(
      'API Key inválida',
    );
  });

  it('con el header repetido usa el primer valor', () => {
    expect(
      guard.canActivate(contextFor('runBatch', { 'x-api-key': ['test-secret', 'otro'] })),
    ).toBe(true);
    expect(() =>
      guard.canActivate(contextFor('runBatch', { 'x-api-key': ['test-secre', 'test-secret'] })),
    ).toThrow('API Key inválida');
  });

  it('los endpoints @Public() no piden key', () => {
    expect(guard.canActivate(contextFor('health'))).toBe(true);
  });

  it('sin API_KEY configurada rechaza todo lo protegido', () => {
    const open = new ApiKeyGuard(new ConfigService({}), new Reflector());
    expect(() => open.canActivate(contextFor('runBatch', { 'x-api-key': 'test-secret' }))).toThrow(
      'API_KEY no configurada en el servidor',
    );
  });
});
