import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { Coordinates, ResolutionTier, errorMessage } from '@droidtap/shared';
import { ResolveQueryDto } from './dto/resolve-query.dto';
import { ResolutionCascadeService } from './resolution-cascade.service';

export interface TapResponse {
  success: boolean;
  query: string;
  tier?: ResolutionTier;
  label?: string;
  coordinates?: Coordinates;
  reason?: string;
}

@Controller('resolver')
export class ResolverController {
  private readonly logger = new Logger(ResolverController.name);

  constructor(private readonly cascade: ResolutionCascadeService) {}

  @Post('tap')
  @HttpCode(HttpStatus.OK)
  async tap(@Body() body: ResolveQueryDto): Promise<TapResponse> {
    this.logger.log(`Tap request: ${body.query}`);
    const outcome = await this.run('resolve query', () =>
      this.cascade.tapQuery(body.query),
    );

    if (!outcome.success) {
      return { success: false, query: outcome.query, reason: outcome.reason };
    }
    const { tier, label, coordinates } = outcome.target;
    return { success: true, query: outcome.query, tier, label, coordinates };
  }

  @Get('visible-text')
  async visibleText(): Promise<{ text: string[] }> {
    const text = await this.run('list visible text', () =>
      this.cascade.listVisibleText(),
    );
    return { text };
  }

  @Get('screen')
  async screen(): Promise<{ description: string }> {
    const description = await this.run('describe screen', () =>
      this.cascade.describeScreen(),
    );
    return { description };
  }

  private async run<T>(action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      this.logger.error(
        `Failed to ${action}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new HttpException(
        `Failed to ${action}: ${errorMessage(error)}`,
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
  }
}
