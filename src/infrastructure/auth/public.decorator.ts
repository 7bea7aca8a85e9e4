import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/** El endpoint no requiere x-api-key (p.ej. /contacts/health) */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
