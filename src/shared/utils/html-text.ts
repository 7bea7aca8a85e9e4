import * as cheerio from 'cheerio';

/**
 * Texto visible de un documento, con `separator` entre cada elemento.
 * Sin el separador, "<span>Tel</span><span>+91...</span>" quedaría pegado.
 */
export function visibleText(html: string, separator = ' '): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, template, svg').remove();
  $('body *').each((_, el) => {
    $(el).prepend(separator).append(separator);
  });
  return $('body').text();
}

/** Líneas no vacías del texto visible */
export function visibleLines(html: string): string[] {
  return visibleText(html, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter(Boolean);
}

/**
 * Cada texto del fragmento por separado, sin espacios sobrantes.
 * "<p>12 MG Road<br>Bengaluru</p>" → ["12 MG Road", "Bengaluru"]
 */
export function strippedStrings(html: string): string[] {
  return visibleText(html, '\uE000')
    .split('\uE000')
    .map((s) => s.replace(/\s+/g, ' ').trim())
    .filter(Boolean);
}
