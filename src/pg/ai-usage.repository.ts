import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';

export interface AiUsageLogInput {
  kind: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd?: number | null;
  extra?: Record<string, unknown>;
}

export const PG_POOL = 'PG_POOL';

@Injectable()
export class AiUsageRepository {
  constructor(
    @Inject(PG_POOL)
    private readonly pool: Pool,
  ) {}

  async create(data: AiUsageLogInput): Promise<void> {
    await this.pool.query(
      `INSERT INTO ai_usage_logs
         (kind, model, input_tokens, output_tokens, total_tokens, cost_usd, extra, created_at)
       VALUES ($1,   $2,    $3,           $4,            $5,            $6,       $7,    NOW())`,
      [
        data.kind,
        data.model,
        data.inputTokens,
        data.outputTokens,
        data.totalTokens,
        data.costUsd ?? null,
        data.extra ? JSON.stringify(data.extra) : null,
      ],
    );
  }
}
