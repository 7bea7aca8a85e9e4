import { SkipReason } from '../../domain/enums/result-status.enum';

/** Nombres genéricos o inválidos que no vale la pena buscar */
const JUNK_NAMES = new Set([
  'n/a', 'none', 'freelance', 'freelancer', 'individual projects',
  'pvt ltd company', 'pet store', 'call center', 'not applicable',
  'test', 'demo', 'sample', 'unknown', 'na', 'nil', 'null',
]);

/**
 * Sufijos societarios y genéricos que no aparecen en el dominio.
 * El orden importa: las variantes largas van antes que sus prefijos.
 */
const CORPORATE_SUFFIXES = [
  ' pvt. ltd.', ' pvt ltd.', ' pvt. ltd', ' pvt ltd',
  ' private limited', ' limited', ' ltd.', ' ltd',
  ' llp', ' inc.', ' inc', ' india', ' group',
  ' services', ' solutions', ' technologies', ' technology',
];

/** "acme.in", "foo-bar.co.in" */
const DOMAIN_SHAPE = /^[a-z0-9][-a-z0-9]*\.[a-z]{2,6}(\.[a-z]{2,})?$/;

/** "ABC12345": parece un código interno, no un nombre */
const CODE_SHAPE = /^[A-Z]{2,4}\d{4,}$/;

/**
 * Normaliza espacios: "  ACME   Pvt Ltd " → "ACME Pvt Ltd"
 */
export function cleanCompanyName(fname: string): string {
  return fname.trim().replace(/\s+/g, ' ');
}

/**
 * Nombre simplificado para comparar contra dominios.
 * "ACME Pvt Ltd" → "acme", "Tata Consultancy Services" → "tataconsultancy"
 */
export function simplifyName(name: string): string {
  let simple = name.toLowerCase();
  for (const suffix of CORPORATE_SUFFIXES) {
    simple = simple.replaceAll(suffix, '');
  }
  return simple.replace(/[^a-z0-9]/g, '');
}

/**
 * Clave del cache de URLs. Si la simplificación deja un string vacío
 * (nombres sólo con símbolos o sufijos) usa el nombre en minúsculas.
 */
export function cacheKeyFor(name: string): string {
  return simplifyName(name) || name.toLowerCase().trim();
}

/**
 * Devuelve el motivo por el que no se debe procesar el nombre, o null si es válido.
 */
export function detectSkipReason(name: string): SkipReason | null {
  const lower = name.toLowerCase().trim();

  if (lower.length < 3) return SkipReason.NAME_TOO_SHORT;
  if (JUNK_NAMES.has(lower)) return SkipReason.GENERIC_OR_INVALID_NAME;
  if (CODE_SHAPE.test(name.trim())) return SkipReason.LOOKS_LIKE_CODE;

  return null;
}

/**
 * Si el "nombre" ya es un dominio devuelve su URL https, si no null.
 * "Sulekha.com" → "https://sulekha.com"
 */
export function toDirectDomainUrl(name: string): string | null {
  const cleaned = name.trim().toLowerCase();
  return DOMAIN_SHAPE.test(cleaned) ? `https://${cleaned}` : null;
}
