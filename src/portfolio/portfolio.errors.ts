import { BadRequestException, NotFoundException } from '@nestjs/common';

export class InvalidPositionException extends BadRequestException {
  constructor(readonly problems: string[]) {
    super(problems, 'Invalid position');
    this.message = `Invalid position: ${problems.join('; ')}`;
  }
}

// Index-addressed edit/delete outside 0 <= index < length.
export class PositionIndexOutOfRangeException extends NotFoundException {
  constructor(
    readonly index: number,
    readonly length: number,
  ) {
    super(`Position index ${index} is out of range (portfolio has ${length} position${length === 1 ? '' : 's'})`);
  }
}
