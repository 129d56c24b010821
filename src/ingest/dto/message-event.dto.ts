import {
  IsBase64,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsRFC3339,
  IsString,
  Min,
} from 'class-validator';

/**
 * Message event as posted by the messaging client. Binary media fields
 * travel as base64.
 */
export class MessageEventDto {
  // May be empty: some client events carry no native id.
  @IsString()
  id!: string;

  @IsString()
  @IsNotEmpty({ message: 'chatJid is required.' })
  chatJid!: string;

  @IsString()
  sender!: string;

  @IsOptional()
  @IsString()
  recipient?: string;

  @IsOptional()
  @IsString()
  content?: string;

  // Date-time with an offset; ISO week and ordinal dates are refused.
  @IsRFC3339({ message: 'timestamp must be an RFC 3339 date-time.' })
  timestamp!: string;

  @IsBoolean()
  isFromMe!: boolean;

  @IsOptional()
  @IsString()
  mediaType?: string;

  @IsOptional()
  @IsString()
  filename?: string;

  @IsOptional()
  @IsString()
  url?: string;

  @IsOptional()
  @IsBase64()
  mediaKey?: string;

  @IsOptional()
  @IsBase64()
  fileSha256?: string;

  @IsOptional()
  @IsBase64()
  fileEncSha256?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  fileLength?: number;
}
