/** Datos de contacto extraídos de un PageSet */
export interface ContactInfo {
  /** Ordenados, sin duplicados */
  emails: string[];
  /** Ordenados, sin duplicados, formato internacional (+91 ...) */
  phoneNumbers: string[];
  about: string | null;
  address: string | null;
  /** GST Identification Number (15 caracteres) */
  gstin: string | null;
  /** Corporate Identity Number (21 caracteres) */
  cin: string | null;
}

export function hasContactChannels(info: Pick<ContactInfo, 'emails' | 'phoneNumbers'>): boolean {
  return info.emails.length > 0 || info.phoneNumbers.length > 0;
}
