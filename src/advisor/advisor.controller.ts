// src/advisor/advisor.controller.ts
import { Body, Controller, Get, HttpCode, Post, Res } from '@nestjs/common';
import type { Response } from 'express';

import { SearchCoverage } from '../search/search.types';
import { lawCategories } from '../sources/source-registry';
import { LegalAnalysis } from '../synthesis/synthesis.types';
import { ContextExtraction, ContextExtractor } from './context-extractor.service';
import { ExtractContextDto, QueryRequestDto } from './dto/business-context.dto';
import { RequestCoordinator } from './request-coordinator.service';
import { withClientAbort } from './client-abort';

export type QueryResponse = LegalAnalysis & { coverage: SearchCoverage };

@Controller()
export class AdvisorController {
  constructor(
    private readonly coordinator: RequestCoordinator,
    private readonly contextExtractor: ContextExtractor,
  ) {}

  @Post('api/query')
  @HttpCode(200)
  async query(
    @Body() body: QueryRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<QueryResponse> {
    const { analysis, coverage } = await withClientAbort(res, (signal) =>
      this.coordinator.run({ query: body.query, context: body.context }, { signal }),
    );
    return { ...analysis, coverage };
  }

  @Get('advisor/law-categories')
  categories(): { categories: string[] } {
    return { categories: lawCategories() };
  }

  @Post('advisor/context/extract')
  @HttpCode(200)
  extractContext(@Body() body: ExtractContextDto): Promise<ContextExtraction> {
    return this.contextExtractor.extract(body.input);
  }
}
