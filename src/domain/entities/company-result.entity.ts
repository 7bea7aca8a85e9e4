import { ResultSource, ResultStatus } from '../enums/result-status.enum';
import { ContactInfo } from './contact-info.entity';

/**
 * Resultado final de una empresa.
 * Entidad de dominio, no depende de frameworks.
 */
export class CompanyResult implements ContactInfo {
  id: string;

  /** Nombre tal como vino en la entrada */
  fname: string;

  /** Web oficial, o el directorio si no hubo web oficial */
  websiteUrl: string | null;

  emails: string[];
  phoneNumbers: string[];
  about: string | null;
  address: string | null;
  gstin: string | null;
  cin: string | null;

  source: ResultSource;
  status: ResultStatus;

  /** Motivo de skip/fallo, o el mensaje de la excepción */
  error: string | null;

  constructor(params: {
    id: string;
    fname: string;
    websiteUrl?: string | null;
    emails?: string[];
    phoneNumbers?: string[];
    about?: string | null;
    address?: string | null;
    gstin?: string | null;
    cin?: string | null;
    source?: ResultSource;
    status?: ResultStatus;
    error?: string | null;
  }) {
    this.id = params.id;
    this.fname = params.fname;
    this.websiteUrl = params.websiteUrl ?? null;
    this.emails = params.emails ?? [];
    this.phoneNumbers = params.phoneNumbers ?? [];
    this.about = params.about ?? null;
    this.address = params.address ?? null;
    this.gstin = params.gstin ?? null;
    this.cin = params.cin ?? null;
    this.source = params.source ?? ResultSource.NONE;
    this.status = params.status ?? ResultStatus.FAILED;
    this.error = params.error ?? null;
  }

  static skipped(id: string, fname: string, reason: string): CompanyResult {
    return new CompanyResult({ id, fname, status: ResultStatus.SKIPPED, error: reason });
  }

  /** ¿Tiene email, teléfono o descripción? */
  get hasData(): boolean {
    return this.emails.length > 0 || this.phoneNumbers.length > 0 || Boolean(this.about);
  }

  /** Copia los campos de contacto (pisa los actuales) */
  applyContactInfo(info: ContactInfo): void {
    this.emails = info.emails;
    this.phoneNumbers = info.phoneNumbers;
    this.about = info.about;
    this.address = info.address;
    this.gstin = info.gstin;
    this.cin = info.cin;
  }

  /** Completa sólo los campos vacíos; lo que ya vino de la web oficial no se toca */
  fillMissing(info: ContactInfo): void {
    if (this.emails.length === 0) this.emails = info.emails;
    if (this.phoneNumbers.length === 0) this.phoneNumbers = info.phoneNumbers;
    this.about = this.about || info.about;
    this.address = this.address || info.address;
    this.gstin = this.gstin || info.gstin;
    this.cin = this.cin || info.cin;
  }

  get summary(): string {
    const parts = [`${this.status}`];
    if (this.emails.length) parts.push(`${this.emails.length} email(s)`);
    if (this.phoneNumbers.length) parts.push(`${this.phoneNumbers.length} tel(s)`);
    if (this.gstin) parts.push('GSTIN');
    if (this.cin) parts.push('CIN');
    return parts.join(', ');
  }
}
