import { IsString, IsOptional, IsArray, MinLength, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class ProjectSpecDto {
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  name!: string;

  @ApiProperty({ required: false, nullable: true, type: String })
  @IsString()
  @IsOptional()
  @MaxLength(2048)
  logo?: string | null;

  @ApiProperty({ required: false, nullable: true, type: String })
  @IsString()
  @IsOptional()
  details?: string | null;

  @ApiProperty({ required: false, type: [String], description: 'Document URLs; replaces the current list on update' })
  @IsArray()
  @IsString({ each: true })
  @MaxLength(2048, { each: true })
  @IsOptional()
  documents?: string[];
}

export class DocumentDto {
  id!: number;
  project_id!: number;
  url!: string;
}

export class ProjectDto {
  id!: number;
  name!: string;
  @ApiProperty({ nullable: true, type: String })
  logo!: string | null;
  @ApiProperty({ nullable: true, type: String })
  details!: string | null;
  @ApiProperty({ type: [DocumentDto] })
  documents!: DocumentDto[];
}

export class ProjectInfoDto {
  id!: number;
  name!: string;
  @ApiProperty({ nullable: true, type: String })
  logo!: string | null;
  @ApiProperty({ nullable: true, type: String })
  details!: string | null;
  @ApiProperty({ type: [String] })
  documents!: string[];
}

export class CreateProjectResponseDto {
  project_id!: number;
  project!: ProjectDto;
}

export class MessageResponseDto {
  message!: string;
}
