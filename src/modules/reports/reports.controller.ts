import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JournalValidationPipe } from '../../common/pipes/journal-validation.pipe';
import { ReportsService } from './reports.service';
import { ReportQueryDto } from './dto/report-query.dto';
import {
  DailyReportResponseDto,
  WeeklyReportResponseDto,
  toDailyReportDto,
  toWeeklyReportDto,
} from './dto/report-response.dto';

@ApiTags('Reports')
@Controller('reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('daily')
  @ApiOperation({ summary: "Today's (UTC) trading stats for a user" })
  @ApiResponse({ status: 200, type: DailyReportResponseDto })
  async daily(
    @Query(new JournalValidationPipe()) query: ReportQueryDto,
  ): Promise<DailyReportResponseDto> {
    const report = await this.reportsService.daily(query.user_id, new Date());
    return {
      data: toDailyReportDto(report),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('weekly')
  @ApiOperation({ summary: 'Stats over the last seven UTC days' })
  @ApiResponse({ status: 200, type: WeeklyReportResponseDto })
  async weekly(
    @Query(new JournalValidationPipe()) query: ReportQueryDto,
  ): Promise<WeeklyReportResponseDto> {
    const report = await this.reportsService.weekly(query.user_id, new Date());
    return {
      data: toWeeklyReportDto(report),
      timestamp: new Date().toISOString(),
    };
  }
}
