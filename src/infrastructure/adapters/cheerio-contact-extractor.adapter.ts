import { Injectable } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { ContactInfo } from '../../domain/entities/contact-info.entity';
import { PageSet } from '../../domain/entities/page-set.entity';
import { ContentExtractorPort } from '../../domain/ports/content-extractor.port';
import { strippedStrings, visibleLines, visibleText } from '../../shared/utils/html-text';
import { PHONE_CANDIDATE, normalizePhone } from '../../shared/utils/indian-phone';
import { JsonLdNode, isRecord, jsonLdNodes } from '../../shared/utils/json-ld';

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
/** GST Identification Number: 2 dígitos de estado + PAN + entidad + Z + checksum */
const GSTIN_REGEX = /\d{2}[A-Z]{5}\d{4}[A-Z][A-Z\d]Z[A-Z\d]/;
/** Corporate Identity Number (MCA) */
const CIN_REGEX = /[A-Z]\d{5}[A-Z]{2}\d{4}[A-Z]{3}\d{6}/;
const PIN_CODE_REGEX = /\b[1-9]\d{5}\b/;

/** Dominios que aparecen en HTML pero nunca son el contacto de la empresa */
const EMAIL_BLOCKED_DOMAINS = new Set([
  'example.com', 'sentry.io', 'wixpress.com', 'googleapis.com',
  'w3.org', 'schema.org', 'ogp.me', 'facebook.com',
  'apple.com', 'google.com', 'mozilla.org',
]);

/** logo@2x.png, bundle.js, ... */
const EMAIL_BLOCKED_PATTERNS = [
  /@\dx\./,
  /\.(png|jpg|jpeg|gif|svg|webp|ico)$/,
  /\.(js|css|woff|ttf|eot)$/,
];

const ABOUT_MAX_LENGTH = 2000;
const ADDRESS_MAX_LENGTH = 500;

/**
 * Extrae datos de contacto de las páginas de una empresa con Cheerio.
 *
 * - Emails y teléfonos: unión de las tres páginas (home, contacto, about)
 * - GSTIN / CIN: primera coincidencia en ese mismo orden
 * - Descripción: página about, si no el home
 * - Dirección: página de contacto, luego home, luego about
 */
@Injectable()
export class CheerioContactExtractor implements ContentExtractorPort {
  extract(pages: PageSet): ContactInfo {
    const emails = new Set<string>();
    const phones = new Set<string>();
    let gstin: string | null = null;
    let cin: string | null = null;

    const ordered = [pages.homepage, pages.contactPage, pages.aboutPage].filter(
      (html): html is string => Boolean(html),
    );

    for (const html of ordered) {
      for (const email of extractEmails(html)) emails.add(email);
      for (const phone of extractPhones(html)) phones.add(phone);
      gstin = gstin ?? extractPattern(html, GSTIN_REGEX);
      cin = cin ?? extractPattern(html, CIN_REGEX);
    }

    let about: string | null = null;
    if (pages.aboutPage) about = extractAbout(pages.aboutPage);
    if (!about && pages.homepage) about = extractAbout(pages.homepage);

    let address: string | null = null;
    for (const html of [pages.contactPage, pages.homepage, pages.aboutPage]) {
      if (address) break;
      if (html) address = extractAddress(html);
    }

    return {
      emails: [...emails].sort(),
      phoneNumbers: [...phones].sort(),
      about,
      address,
      gstin,
      cin,
    };
  }
}

// ════════════════════════════════════════════════════════
// EXTRACTORES
// ════════════════════════════════════════════════════════

export function extractEmails(html: string): string[] {
  const $ = cheerio.load(html);
  const found = new Set<string>();

  $('a[href^="mailto:"]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    const address = safeDecode(href.slice('mailto:'.length).split('?')[0]).trim().toLowerCase();
    if (address.includes('@')) found.add(address);
  });

  for (const source of [visibleText(html), html]) {
    for (const match of source.matchAll(EMAIL_REGEX)) {
      found.add(match[0].toLowerCase());
    }
  }

  return [...found].filter(isPlausibleEmail).sort();
}

function isPlausibleEmail(email: string): boolean {
  const domain = email.split('@').pop() ?? '';
  if (EMAIL_BLOCKED_DOMAINS.has(domain)) return false;
  if (EMAIL_BLOCKED_PATTERNS.some((p) => p.test(email))) return false;

  const tld = domain.split('.').pop() ?? '';
  return tld.length >= 2 && tld.length <= 10;
}

export function extractPhones(html: string): string[] {
  const $ = cheerio.load(html);
  const phones = new Set<string>();
  const add = (raw: string, requirePrefix = false) => {
    const phone = normalizePhone(raw, requirePrefix);
    if (phone) phones.add(phone);
  };

  // schema.org microdata
  $('[itemprop="telephone"]').each((_, el) => add($(el).text()));

  $('a[href^="tel:"]').each((_, el) => {
    add(safeDecode(($(el).attr('href') ?? '').slice('tel:'.length)));
  });

  for (const node of jsonLdNodes($)) {
    for (const raw of jsonLdTelephones(node)) add(raw);
  }

  // Texto libre: sólo móviles o fijos con prefijo
  for (const match of visibleText(html).matchAll(PHONE_CANDIDATE)) {
    add(match[0], true);
  }

  return [...phones].sort();
}

function jsonLdTelephones(node: JsonLdNode): string[] {
  const found: string[] = [];
  for (const key of ['telephone', 'phone', 'contactPoint']) {
    const value = node[key];
    const items = Array.isArray(value) ? value : [value];
    for (const item of items) {
      if (typeof item === 'string') {
        found.push(item);
      } else if (isRecord(item) && typeof item.telephone === 'string') {
        found.push(item.telephone);
      }
    }
  }
  return found;
}

export function extractAbout(html: string): string | null {
  const $ = cheerio.load(html);
  $('script, style, noscript, nav, header, footer, aside, form').remove();

  const main = $('main, article, [role="main"]').first();
  const scope = main.length > 0 ? main : $('body');
  const paragraphs = scope
    .find('p')
    .map((_, el) => $(el).text().replace(/\s+/g, ' ').trim())
    .get()
    .filter((text) => text.length >= 30);

  const text = paragraphs.join('\n').trim();
  if (text.length > 30) return text.slice(0, ABOUT_MAX_LENGTH);

  for (const selector of ['meta[name="description"]', 'meta[property="og:description"]']) {
    const desc = ($(selector).attr('content') ?? '').trim();
    if (desc.length > 20) return desc;
  }

  return null;
}

export function extractAddress(html: string): string | null {
  const $ = cheerio.load(html);

  const microdata = $('[itemprop="address"]').first();
  if (microdata.length > 0) {
    const text = strippedStrings($.html(microdata)).join(', ');
    if (text.length > 10) return text.slice(0, ADDRESS_MAX_LENGTH);
  }

  for (const node of jsonLdNodes($)) {
    const address = node.address;
    if (isRecord(address)) {
      const full = ['streetAddress', 'addressLocality', 'addressRegion', 'postalCode', 'addressCountry']
        .map((key) => address[key])
        .filter((part): part is string | number => typeof part === 'string' || typeof part === 'number')
        .map((part) => String(part).trim())
        .filter(Boolean)
        .join(', ');
      if (full.length > 10) return full.slice(0, ADDRESS_MAX_LENGTH);
    } else if (typeof address === 'string' && address.length > 10) {
      return address.slice(0, ADDRESS_MAX_LENGTH);
    }
  }

  // Una línea con código PIN y largo razonable suele ser la dirección
  return (
    visibleLines(html).find(
      (line) => PIN_CODE_REGEX.test(line) && line.length > 15 && line.length < 300,
    ) ?? null
  );
}

/** Primero en el texto visible, luego en el HTML crudo (inputs ocultos, atributos) */
function extractPattern(html: string, pattern: RegExp): string | null {
  return pattern.exec(visibleText(html))?.[0] ?? pattern.exec(html)?.[0] ?? null;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
