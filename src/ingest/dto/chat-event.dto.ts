import { IsNotEmpty, IsOptional, IsRFC3339, IsString } from 'class-validator';

export class ChatEventDto {
  @IsString()
  @IsNotEmpty({ message: 'jid is required.' })
  jid!: string;

  @IsOptional()
  @IsString()
  name?: string;

  @IsRFC3339({ message: 'lastMessageTime must be an RFC 3339 date-time.' })
  lastMessageTime!: string;
}
