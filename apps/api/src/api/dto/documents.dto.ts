import { ApiProperty } from '@nestjs/swagger';

export class DocumentUrlDto {
  url!: string;
}

export class DocumentListDto {
  @ApiProperty({ type: [String] })
  documents!: string[];
}
