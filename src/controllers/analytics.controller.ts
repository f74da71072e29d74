import { Body, Controller, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AnalyticsService } from '../services/analytics.service';
import { PowerBudgetReport, PowerBudgetRequestDto } from '../dto/power-budget.dto';

@ApiTags('Analytics')
@Controller('v1/analytics')
export class AnalyticsController {
  private readonly logger = new Logger(AnalyticsController.name);

  constructor(private readonly analyticsService: AnalyticsService) {}

  @Post('budget')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Check the power budget of several devices',
    description:
      'Returns a summary per device id; ids that cannot be evaluated get an error entry instead of failing the request',
  })
  @ApiResponse({ status: 200, description: 'Budget per device id' })
  async powerBudgetCheck(
    @Body() body: PowerBudgetRequestDto,
  ): Promise<PowerBudgetReport> {
    this.logger.log(`Budget check for ${body.deviceIds.length} devices`);
    return this.analyticsService.powerBudgetCheck(body.deviceIds);
  }
}
