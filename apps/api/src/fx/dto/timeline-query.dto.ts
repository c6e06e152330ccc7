import { IsString } from 'class-validator';
import { GetRateDto } from './get-rate.dto';

export class TimelineQueryDto extends GetRateDto {
  /** YYYY-MM-DD, inclusive. */
  @IsString()
  start!: string;

  /** YYYY-MM-DD, inclusive. */
  @IsString()
  end!: string;
}
