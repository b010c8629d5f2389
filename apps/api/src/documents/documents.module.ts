import { Module } from '@nestjs/common';
import { BlobStorageProvider } from '../providers/blob-storage.provider';
import { ProjectsModule } from '../projects/projects.module';
import { DocumentsService } from './documents.service';

@Module({
  imports: [ProjectsModule],
  providers: [BlobStorageProvider, DocumentsService],
  exports: [DocumentsService],
})
export class DocumentsModule {}
