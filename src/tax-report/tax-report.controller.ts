import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { TaxReportRequestDto } from './dto/tax-report-request.dto';
import { TaxReportResponseDto } from './dto/tax-report-response.dto';
import { TaxReportService } from './tax-report.service';

@Controller('tax-report')
export class TaxReportController {
  constructor(private readonly taxReportService: TaxReportService) {}

  /**
   * Computes FIFO-matched realized gains and reconciled dividends for a batch
   * of broker rows. Stateless - nothing is stored between calls.
   *
   * POST /tax-report
   * @returns 200 with the report; 400 on a malformed row, 422 when a sale
   * cannot be funded or a rate is missing
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  generateReport(@Body() request: TaxReportRequestDto): TaxReportResponseDto {
    return this.taxReportService.generateReport(request);
  }
}
