import { Module } from '@nestjs/common';

import { AiModule } from '../ai/ai.module';
import { ResponseSynthesizer } from './response-synthesizer.service';

@Module({
  imports: [AiModule],
  providers: [ResponseSynthesizer],
  exports: [ResponseSynthesizer],
})
export class SynthesisModule {}
