import { Type } from 'class-transformer';
import { IsArray, IsInt, IsOptional, Max, Min, ValidateNested } from 'class-validator';
import { RateSampleDto } from '../../exchange-rate/dto/rate-sample.dto';
import { MoneyFlowRecordDto } from '../../ingestion/dto/money-flow-record.dto';
import { SplitAdjustmentDto } from '../../ingestion/dto/split-adjustment.dto';
import { TradeRecordDto } from '../../ingestion/dto/trade-record.dto';

// Batch of broker rows to compute one tax report from.
export class TaxReportRequestDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TradeRecordDto)
  trades!: TradeRecordDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MoneyFlowRecordDto)
  dividends?: MoneyFlowRecordDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MoneyFlowRecordDto)
  withholdings?: MoneyFlowRecordDto[];

  // replaces the service-wide rate feed for this request
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RateSampleDto)
  exchangeRates?: RateSampleDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SplitAdjustmentDto)
  splits?: SplitAdjustmentDto[];

  // only sales and dividends in this calendar year are reported
  @IsOptional()
  @IsInt()
  @Min(1900)
  @Max(2999)
  taxYear?: number;
}
