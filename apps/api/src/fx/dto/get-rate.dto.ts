import { IsString } from 'class-validator';

// Registry membership is checked by FxService; this only pins the shape.
export class GetRateDto {
  @IsString()
  base!: string;

  @IsString()
  second!: string;
}
