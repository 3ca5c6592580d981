import { IsString, MaxLength } from 'class-validator';

export class ChatQueryDto {
  // Empty strings are allowed through; the engine answers them with a prompt.
  @IsString()
  @MaxLength(1000)
  query!: string;
}
