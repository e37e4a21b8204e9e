import { IsInt, IsNotEmpty, IsOptional, IsString, Matches, NotEquals } from 'class-validator';

// Trade row as pulled out of a broker report.
// The sign of quantity carries the side: negative = sell, positive = buy.
export class TradeRecordDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  tradeId?: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsInt()
  @NotEquals(0)
  quantity!: number;

  @IsString()
  @Matches(/^\d+(\.\d+)?$/, { message: 'price must be an unsigned decimal string' })
  price!: string;

  // ISO-8601 or the broker's "2019-01-15, 10:11:38"
  @IsString()
  @IsNotEmpty()
  dateTime!: string;
}
