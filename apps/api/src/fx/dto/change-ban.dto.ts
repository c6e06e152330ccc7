import { IsBoolean, IsString } from 'class-validator';

export class ChangeBanDto {
  @IsString()
  currency!: string;

  @IsBoolean()
  banned!: boolean;
}
