import * as cheerio from 'cheerio';

export type JsonLdNode = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonLdNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Todos los nodos JSON-LD del documento, aplanando arrays y @graph.
 * Los bloques con JSON inválido se ignoran.
 */
export function jsonLdNodes($: cheerio.CheerioAPI): JsonLdNode[] {
  const nodes: JsonLdNode[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).html();
    if (!raw) return;

    let data: unknown;
    try {
      data = JSON.parse(raw.trim());
    } catch {
      return;
    }
    collect(data, nodes);
  });

  return nodes;
}

function collect(data: unknown, out: JsonLdNode[]): void {
  if (Array.isArray(data)) {
    for (const item of data) collect(item, out);
    return;
  }
  if (!isRecord(data)) return;

  out.push(data);
  const graph = data['@graph'];
  if (Array.isArray(graph)) collect(graph, out);
}
