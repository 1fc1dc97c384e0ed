// src/synthesis/response-synthesizer.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import { AiService } from '../ai/ai.service';
import { advisorConfig } from '../config/advisor.config';
import { LegalSourceRecord } from '../search/search.types';
import { SynthesisAbortedError } from '../shared/errors';
import { parseAnalysisPayload } from './model-output.parser';
import { buildSynthesisPrompt, formatSources } from './synthesis-prompt';
import { BusinessContext, LegalAnalysis, SynthesisOptions } from './synthesis.types';

@Injectable()
export class ResponseSynthesizer {
  private readonly logger = new Logger(ResponseSynthesizer.name);
  private readonly temperature: number;

  constructor(
    private readonly ai: AiService,
    @Inject(advisorConfig.KEY)
    config: ConfigType<typeof advisorConfig>,
  ) {
    this.temperature = config.synthesis.temperature;
  }

  /**
   * Turns three jurisdiction source sets into one structured analysis with a
   * single model call. Parse failures propagate as SynthesisParseError.
   */
  async synthesize(
    context: BusinessContext,
    federal: readonly LegalSourceRecord[],
    state: readonly LegalSourceRecord[],
    local: readonly LegalSourceRecord[],
    options: SynthesisOptions = {},
  ): Promise<LegalAnalysis> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new SynthesisAbortedError('Synthesis aborted before the model call', {
        cause: signal.reason,
      });
    }

    const prompt = buildSynthesisPrompt(context, {
      federal: formatSources(federal),
      state: formatSources(state),
      local: formatSources(local),
    });

    const started = performance.now();

    let text: string;
    try {
      ({ text } = await this.ai.complete({
        kind: 'synthesizeLegalAnalysis',
        prompt,
        temperature: this.temperature,
        signal,
        extra: { area_of_law: context.area_of_law, state: context.state },
      }));
    } catch (error) {
      if (signal?.aborted) {
        throw new SynthesisAbortedError('Synthesis aborted during the model call', {
          cause: signal.reason ?? error,
        });
      }
      throw error;
    }

    const payload = parseAnalysisPayload(text);
    const responseTime = (performance.now() - started) / 1000;

    this.logger.log(
      `🧾 Synthesized analysis from ${federal.length}/${state.length}/${local.length} sources in ${responseTime.toFixed(2)}s`,
    );

    return {
      ...payload,
      sources: [...federal, ...state, ...local].map((r) => r.url),
      response_time: responseTime,
    };
  }
}
