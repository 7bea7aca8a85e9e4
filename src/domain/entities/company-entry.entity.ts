/** Una empresa de la lista de entrada */
export interface CompanyEntry {
  id: string;
  /** Nombre tal como viene (sin limpiar) */
  fname: string;
}
