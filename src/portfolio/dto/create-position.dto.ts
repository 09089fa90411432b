import { Transform } from 'class-transformer';
import { IsInt, IsNotEmpty, IsNumber, IsPositive, IsString, Min } from 'class-validator';

// Request body for adding or replacing a holding.
export class CreatePositionDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  buyPrice!: number;        // per share

  @IsInt()
  @IsPositive()
  shares!: number;
}
