import * as cheerio from 'cheerio';

export interface DiscoveredSubpages {
  aboutUrl: string | null;
  contactUrl: string | null;
}

const ABOUT_TEXT = ['about', 'company', 'who we are', 'our story', 'who-we-are'];
const ABOUT_HREF = ['about', 'company', 'who-we'];
const CONTACT_TEXT = ['contact', 'reach us', 'get in touch', 'reach-us'];
const CONTACT_HREF = ['contact', 'reach', 'get-in-touch'];

/** Rutas probadas si el home no enlaza la página */
export const ABOUT_PATHS = [
  '/about', '/about-us', '/about-us/', '/aboutus', '/company',
  '/who-we-are', '/our-company', '/our-story', '/about-company',
  '/about-company.html', '/about.html',
];

export const CONTACT_PATHS = [
  '/contact', '/contact-us', '/contact-us/', '/contactus',
  '/reach-us', '/get-in-touch', '/contact.html',
];

/**
 * Resuelve un href contra la base. Sólo http(s), sin fragmento.
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    url.hash = '';
    return url.href;
  } catch {
    return null;
  }
}

/**
 * Busca en el home el primer link "about" y el primer link "contacto".
 * Un link cuenta si su texto o su href contiene alguna palabra clave.
 */
export function discoverSubpages(html: string, baseUrl: string): DiscoveredSubpages {
  const result: DiscoveredSubpages = { aboutUrl: null, contactUrl: null };
  const $ = cheerio.load(html);

  $('a[href]').each((_, el) => {
    const href = ($(el).attr('href') ?? '').trim();
    if (!href) return;

    const text = $(el).text().replace(/\s+/g, ' ').trim().toLowerCase();
    const hrefLower = href.toLowerCase();

    if (!result.aboutUrl && matches(text, hrefLower, ABOUT_TEXT, ABOUT_HREF)) {
      result.aboutUrl = resolveLink(href, baseUrl);
    }
    if (!result.contactUrl && matches(text, hrefLower, CONTACT_TEXT, CONTACT_HREF)) {
      result.contactUrl = resolveLink(href, baseUrl);
    }

    if (result.aboutUrl && result.contactUrl) return false;
    return undefined;
  });

  return result;
}

function matches(text: string, href: string, textKeys: string[], hrefKeys: string[]): boolean {
  return textKeys.some((k) => text.includes(k)) || hrefKeys.some((k) => href.includes(k));
}
