/** Estado final de una empresa procesada */
export enum ResultStatus {
  /** Se obtuvo email, teléfono o descripción */
  SUCCESS = 'success',
  /** Hay web pero ningún dato útil */
  PARTIAL = 'partial',
  FAILED = 'failed',
  /** Nombre inválido: no se intentó nada */
  SKIPPED = 'skipped',
}

/** De dónde salieron los datos de contacto */
export enum ResultSource {
  NONE = 'none',
  OFFICIAL_WEBSITE = 'official_website',
  DIRECTORY = 'directory',
  OFFICIAL_WEBSITE_AND_DIRECTORY = 'official_website+directory',
}

/** Motivos para no procesar un nombre */
export enum SkipReason {
  NAME_TOO_SHORT = 'name_too_short',
  GENERIC_OR_INVALID_NAME = 'generic_or_invalid_name',
  LOOKS_LIKE_CODE = 'looks_like_code',
}

/** Motivos de fallo guardados en `error` */
export enum FailureReason {
  NO_WEBSITE_FOUND = 'no_website_found',
  COULD_NOT_FETCH_PAGES = 'could_not_fetch_pages',
}
