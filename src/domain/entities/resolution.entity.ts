/**
 * Resultado de resolver un nombre a su web oficial.
 * Se guarda también cuando no se encontró nada (url = null) para no
 * volver a buscar en la siguiente corrida.
 */
export interface ResolutionRecord {
  url: string | null;
  /** Primer hit de JustDial / IndiaMART visto durante la búsqueda */
  directoryUrl: string | null;
}

export interface Resolution extends ResolutionRecord {
  /** true si salió del cache (cero llamadas de red) */
  cached: boolean;
}
