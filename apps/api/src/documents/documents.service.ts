import { Injectable, Inject, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { extname } from 'path';
import { BLOB_STORAGE } from '../providers/blob-storage.provider';
import { ProjectsService, type DocumentView } from '../projects/projects.service';
import { ProjectNotFoundException } from '../projects/exceptions/project-not-found.exception';
import type { BlobStorage } from './blob-storage.interface';

export interface UploadedFile {
  filename: string;
  mimetype: string;
  body: Buffer;
}

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    @Inject(BLOB_STORAGE) private readonly storage: BlobStorage,
    private readonly projectsService: ProjectsService,
  ) {}

  /** Stores the file externally and attaches the resulting URL to the project. */
  async upload(projectId: number, file: UploadedFile): Promise<{ url: string }> {
    if (!(await this.projectsService.exists(projectId))) {
      throw new ProjectNotFoundException();
    }

    const key = `projects/${projectId}/${randomUUID()}${extname(file.filename).toLowerCase()}`;
    const url = await this.storage.put(key, file.body, file.mimetype);

    let document: DocumentView;
    try {
      document = await this.projectsService.addDocument(projectId, url);
    } catch (err) {
      if (err instanceof ProjectNotFoundException) {
        this.logger.warn({ projectId, key }, 'Project deleted during upload, stored blob is orphaned');
      }
      throw err;
    }

    this.logger.log({ projectId, documentId: document.id }, 'Document uploaded');
    return { url: document.url };
  }

  async list(projectId: number): Promise<{ documents: string[] }> {
    return { documents: await this.projectsService.listDocumentUrls(projectId) };
  }
}
