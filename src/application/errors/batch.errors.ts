import { BadRequestException, ConflictException } from '@nestjs/common';

/** Rango start/end fuera de la lista de entrada */
export class InvalidRangeException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

/** Entrada que no es una lista de {id, fname} */
export class InvalidInputException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

/** Ya hay un lote corriendo en este proceso (comparten caches en disco) */
export class BatchAlreadyRunningException extends ConflictException {
  constructor() {
    super('Ya hay un lote en ejecución; espere a que termine');
  }
}
