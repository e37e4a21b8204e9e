import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

// Dividend or withholding tax row from a broker report.
export class MoneyFlowRecordDto {
  @IsString()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be YYYY-MM-DD' })
  date!: string;

  // e.g. "VOO(US9229083632) Cash Dividend USD 1.33 per Share"
  @IsString()
  @IsNotEmpty()
  description!: string;

  // overrides the symbol taken from the description
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  symbol?: string;

  @IsString()
  @Matches(/^-?\d+(\.\d+)?$/, { message: 'amount must be a signed decimal string' })
  amount!: string;
}
