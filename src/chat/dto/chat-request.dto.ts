import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import type { ChatRole } from '../../../libs/common';

export const DEFAULT_INFERENCE = {
  maxTokens: 1000,
  temperature: 0.7,
  topP: 0.9,
} as const;

export class MessageContentDto {
  @IsString()
  text!: string;
}

export class ConversationMessageDto {
  @IsIn(['user', 'assistant'])
  role!: ChatRole;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MessageContentDto)
  content!: MessageContentDto[];
}

export class InferenceConfigDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  maxTokens?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  temperature?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  topP?: number;
}

export class ChatRequestDto {
  /** The question about the video chunk. */
  @IsString()
  @IsNotEmpty()
  UserQuery!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  modelId?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ConversationMessageDto)
  conversation?: ConversationMessageDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => InferenceConfigDto)
  inferenceConfig?: InferenceConfigDto;

  @IsOptional()
  @IsString()
  chatTransactionId?: string;
}
