/**
 * Query Request DTO
 * One user turn
 */

import { IsString, IsNotEmpty, MaxLength } from 'class-validator';

export const MAX_QUERY_LENGTH = 2000;

export class QueryRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_QUERY_LENGTH)
  declare query: string;
}
