// src/advisor/dto/analysis-artifact.dto.ts
import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNumber,
  IsObject,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export const ANALYSIS_ARTIFACT_KIND = 'legal-analysis';
export const ANALYSIS_ARTIFACT_VERSION = 1;

export class StoredLegalAnalysisDto {
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

  @IsArray()
  @IsString({ each: true })
  sources!: string[];

  @IsNumber()
  @Min(0)
  response_time!: number;
}

export class AnalysisArtifactDto {
  @IsIn([ANALYSIS_ARTIFACT_KIND])
  kind!: string;

  @IsIn([ANALYSIS_ARTIFACT_VERSION])
  version!: number;

  @IsObject()
  @ValidateNested()
  @Type(() => StoredLegalAnalysisDto)
  analysis!: StoredLegalAnalysisDto;
}
