// src/advisor/dto/business-context.dto.ts
import { Type } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';

import { lawCategories } from '../../sources/source-registry';

export class BusinessContextDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  city!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  state!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  business_type!: string;

  @IsIn(lawCategories())
  area_of_law!: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  statute_of_law?: string;
}

export class QueryRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  query!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => BusinessContextDto)
  context!: BusinessContextDto;
}

export class ContextRequestDto {
  @IsObject()
  @ValidateNested()
  @Type(() => BusinessContextDto)
  context!: BusinessContextDto;
}

export class SessionMessageDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  query!: string;
}

export class ExtractContextDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  input!: string;
}
