import { IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { LLM_PROVIDERS, type LLMProvider } from '../providers/types';

/**
 * Multipart fields sent alongside the uploaded files
 */
export class CreateSessionDto {
  @IsOptional()
  @IsIn(LLM_PROVIDERS)
  declare provider?: LLMProvider;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  declare model?: string;
}
