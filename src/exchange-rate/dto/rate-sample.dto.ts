import { IsString, Matches } from 'class-validator';

// Inline exchange rate sample, e.g. { date: '2018-07-27', rate: '62.9471' }
export class RateSampleDto {
  @IsString()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be YYYY-MM-DD' })
  date!: string;

  @IsString()
  @Matches(/^\d+(\.\d+)?$/, { message: 'rate must be an unsigned decimal string' })
  rate!: string;
}
