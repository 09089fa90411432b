import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Min } from 'class-validator';

// Shape of one entry in the persisted snapshot.
// prevClose appears in snapshots written by an older release and is ignored on load.
export class PersistedPositionDto {
  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  buyPrice!: number;

  @IsInt()
  @IsPositive()
  shares!: number;

  @IsOptional()
  @IsNumber()
  prevClose?: number | null;
}
