// src/synthesis/dto/analysis-payload.dto.ts
import { IsArray, IsObject, IsString } from 'class-validator';

/** Shape the synthesis prompt asks the model to return. */
export class AnalysisPayloadDto {
  @IsString()
  summary!: string;

  @IsArray()
  @IsString({ each: true })
  key_points!: string[];

  @IsObject()
  jurisdiction_analysis!: Record<string, unknown>;

  @IsArray()
  @IsString({ each: true })
  compliance_steps!: string[];

  @IsArray()
  @IsString({ each: true })
  overlapping_regulations!: string[];
}
