import { IsInt, IsNotEmpty, IsPositive, IsString, Matches } from 'class-validator';

// Restates trades before effectiveDate in post-split units (ratio new shares per old share).
export class SplitAdjustmentDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsString()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'effectiveDate must be YYYY-MM-DD' })
  effectiveDate!: string;

  @IsInt()
  @IsPositive()
  ratio!: number;
}
