import { Controller, Get, Post, Param, Req, HttpCode } from '@nestjs/common';
import { ApiBearerAuth, ApiConsumes, ApiTags } from '@nestjs/swagger';
import type { FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { DocumentsService } from '../../documents/documents.service';
import { AppBadRequestException } from '../../exceptions/app-bad-request.exception';
import { DocumentUrlDto, DocumentListDto } from '../dto/documents.dto';
import { ParseProjectIdPipe } from '../pipes/parse-project-id.pipe';

@ApiTags('Documents')
@ApiBearerAuth()
@Controller()
export class DocumentsController {
  constructor(private readonly documentsService: DocumentsService) {}

  @Post('projects/:id/documents')
  @HttpCode(200)
  @ApiConsumes('multipart/form-data')
  async upload(@Param('id', ParseProjectIdPipe) id: number, @Req() request: FastifyRequest): Promise<DocumentUrlDto> {
    if (!request.isMultipart()) {
      throw new AppBadRequestException('Expected a multipart/form-data body');
    }
    const file: MultipartFile | undefined = await request.file();
    if (!file) {
      throw new AppBadRequestException('A file is required');
    }

    return this.documentsService.upload(id, {
      filename: file.filename,
      mimetype: file.mimetype,
      body: await file.toBuffer(),
    });
  }

  @Get('project/:id/documents')
  async list(@Param('id', ParseProjectIdPipe) id: number): Promise<DocumentListDto> {
    return this.documentsService.list(id);
  }
}
