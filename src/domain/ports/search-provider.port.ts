/**
 * Token de inyección para el proveedor de búsqueda web.
 */
export const SEARCH_PROVIDER_PORT = 'SEARCH_PROVIDER_PORT';

export interface SearchHit {
  url: string;
  title: string;
  snippet: string;
}

/**
 * Puerto del buscador web (DuckDuckGo, Bing, ...).
 * Parte del dominio: no conoce frameworks ni infraestructura.
 */
export interface SearchProviderPort {
  /**
   * Lanza una excepción ante fallos transitorios (rate limit, timeout);
   * quien llama decide si reintentar.
   * @param region Código de región del buscador (p.ej. "in-en")
   */
  search(query: string, maxResults: number, region: string): Promise<SearchHit[]>;
}
