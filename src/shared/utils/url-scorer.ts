import { simplifyName } from './company-name-cleaner';

/** Puntaje de un candidato que nunca puede ser la web oficial */
export const EXCLUDED_SCORE = -1;

/** TLDs indios tienen prioridad */
export const PREFERRED_TLDS = ['.in', '.co.in', '.gov.in', '.nic.in', '.org.in', '.ac.in'];

/** Redes sociales, portales de empleo y agregadores: nunca son la web oficial */
export const EXCLUDED_DOMAINS = [
  'linkedin.com', 'facebook.com', 'wikipedia.org', 'youtube.com',
  'glassdoor.com', 'glassdoor.co.in', 'ambitionbox.com', 'naukri.com',
  'twitter.com', 'x.com', 'instagram.com', 'indeed.com',
  'crunchbase.com', 'zaubacorp.com', 'tofler.in', 'fundoodata.com',
];

/** Directorios de negocios usados como fallback de contacto */
export const DIRECTORY_DOMAINS = ['justdial.com', 'indiamart.com'];

export interface ScoredCandidate {
  url: string;
  score: number;
}

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * Puntúa una URL según qué tan probable es que sea la web oficial.
 *
 * Criterios:
 *  - Dominio bloqueado (o URL inválida) → -1
 *  - TLD indio (.in, .co.in, ...) → +20 (una sola vez)
 *  - .com → +10
 *  - Nombre simplificado dentro del dominio → +30
 *  - Dominio de menos de 25 caracteres → +5
 *  - HTTPS → +2
 */
export function scoreUrl(url: string, companyName: string): number {
  const parsed = parseUrl(url);
  if (!parsed) return EXCLUDED_SCORE;

  const domain = parsed.host.toLowerCase();
  if (EXCLUDED_DOMAINS.some((blocked) => domain.includes(blocked))) {
    return EXCLUDED_SCORE;
  }

  let score = 0;

  if (PREFERRED_TLDS.some((tld) => domain.endsWith(tld))) score += 20;
  if (domain.endsWith('.com')) score += 10;

  const simplified = simplifyName(companyName);
  const domainClean = domain.replace(/[^a-z0-9]/g, '');
  if (simplified && domainClean.includes(simplified)) score += 30;

  if (domain.length < 25) score += 5;
  if (parsed.protocol === 'https:') score += 2;

  return score;
}

/**
 * Ordena candidatos de mayor a menor puntaje, descartando los excluidos.
 * Array.prototype.sort es estable: a igual puntaje se respeta el orden de entrada.
 */
export function rankCandidates(urls: string[], companyName: string): ScoredCandidate[] {
  return urls
    .map((url) => ({ url, score: scoreUrl(url, companyName) }))
    .filter((c) => c.score > EXCLUDED_SCORE)
    .sort((a, b) => b.score - a.score);
}

export function isDirectoryUrl(url: string): boolean {
  const parsed = parseUrl(url);
  if (!parsed) return false;
  const domain = parsed.host.toLowerCase();
  return DIRECTORY_DOMAINS.some((d) => domain.includes(d));
}
