// src/ai/ai-usage.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { AiUsageRepository, AiUsageLogInput } from '../pg/ai-usage.repository';
import { errorMessage } from '../shared/errors';

@Injectable()
export class AiUsageService {
  private readonly logger = new Logger(AiUsageService.name);

  constructor(private readonly repo: AiUsageRepository) {}

  /**
   * Rough pricing calculator – update values if OpenAI prices change.
   * All prices are USD per 1M tokens.
   */
  computeCostUsd(
    model: string,
    inputTokens: number,
    outputTokens: number,
  ): number | null {
    const pricingPer1M: Record<string, { input: number; output: number }> = {
      'gpt-4.1-mini': { input: 0.4, output: 1.6 },
      'gpt-4.1': { input: 2.0, output: 8.0 },
      'gpt-4o-mini': { input: 0.15, output: 0.6 },
      // fallback
      default: { input: 0.4, output: 1.6 },
    };

    const p = pricingPer1M[model] ?? pricingPer1M.default;

    const inputCost = (inputTokens / 1_000_000) * p.input;
    const outputCost = (outputTokens / 1_000_000) * p.output;

    const total = inputCost + outputCost;
    if (!isFinite(total) || total === 0) return null;
    return Number(total.toFixed(6));
  }

  /** Metering must never fail a user request. */
  async record(input: AiUsageLogInput): Promise<void> {
    try {
      await this.repo.create(input);
    } catch (e) {
      this.logger.warn(`Failed to record AI usage: ${errorMessage(e)}`);
    }
  }
}
