import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq, asc, inArray } from 'drizzle-orm';
import { projects, documents } from '@crewdesk/db';
import type { Database } from '@crewdesk/db';
import { DRIZZLE } from '../providers/drizzle.provider';
import { MembersService } from '../members/members.service';
import { isPgForeignKeyViolation } from '../utils/pg-errors';
import { ProjectNotFoundException } from './exceptions/project-not-found.exception';

const PROJECT_COLUMNS = {
  id: projects.id,
  name: projects.name,
  logo: projects.logo_url,
  details: projects.details,
};

const DOCUMENT_COLUMNS = {
  id: documents.id,
  project_id: documents.project_id,
  url: documents.url,
};

/** Fields a caller supplies on create and on full-replace update. */
export interface ProjectSpec {
  name: string;
  logo?: string | null;
  details?: string | null;
  /** Document URLs, in order. */
  documents?: string[];
}

export interface DocumentView {
  id: number;
  project_id: number;
  url: string;
}

export interface ProjectView {
  id: number;
  name: string;
  logo: string | null;
  details: string | null;
  documents: DocumentView[];
}

/** Flattened shape served by the `/info` endpoints: documents as bare URLs. */
export interface ProjectInfo {
  id: number;
  name: string;
  logo: string | null;
  details: string | null;
  documents: string[];
}

export function toProjectInfo(project: ProjectView): ProjectInfo {
  return {
    id: project.id,
    name: project.name,
    logo: project.logo,
    details: project.details,
    documents: project.documents.map((doc) => doc.url),
  };
}

@Injectable()
export class ProjectsService {
  private readonly logger = new Logger(ProjectsService.name);

  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly membersService: MembersService,
  ) {}

  async list(): Promise<ProjectView[]> {
    const rows = await this.db
      .select(PROJECT_COLUMNS)
      .from(projects)
      .orderBy(asc(projects.id));
    if (rows.length === 0) {return [];}

    const docs = await this.db
      .select(DOCUMENT_COLUMNS)
      .from(documents)
      .where(inArray(documents.project_id, rows.map((row) => row.id)))
      .orderBy(asc(documents.id));

    const byProject = new Map<number, DocumentView[]>();
    for (const doc of docs) {
      const list = byProject.get(doc.project_id) ?? [];
      list.push(doc);
      byProject.set(doc.project_id, list);
    }
    return rows.map((row) => ({ ...row, documents: byProject.get(row.id) ?? [] }));
  }

  async get(projectId: number, db: Database = this.db): Promise<ProjectView | null> {
    const [row] = await db
      .select(PROJECT_COLUMNS)
      .from(projects)
      .where(eq(projects.id, projectId))
      .limit(1);
    if (!row) {return null;}

    const docs = await db
      .select(DOCUMENT_COLUMNS)
      .from(documents)
      .where(eq(documents.project_id, projectId))
      .orderBy(asc(documents.id));
    return { ...row, documents: docs };
  }

  async getById(projectId: number): Promise<ProjectView> {
    const project = await this.get(projectId);
    if (!project) {throw new ProjectNotFoundException();}
    return project;
  }

  async exists(projectId: number): Promise<boolean> {
    const [row] = await this.db
      .select({ id: projects.id })
      .from(projects)
      .where(eq(projects.id, projectId))
      .limit(1);
    return row !== undefined;
  }

  /** Creates the project and makes `ownerId` its owner in the same transaction. */
  async create(ownerId: number, spec: ProjectSpec): Promise<ProjectView> {
    const project = await this.db.transaction(async (tx) => {
      const [created] = await tx.insert(projects).values({
        name: spec.name,
        logo_url: spec.logo ?? null,
        details: spec.details ?? null,
      }).returning({ id: projects.id });

      await this.attachDocuments(tx, created.id, spec.documents ?? []);
      await this.membersService.addMember(created.id, ownerId, true, tx);

      return this.loadOrThrow(tx, created.id);
    });

    this.logger.log({ projectId: project.id, userId: ownerId }, 'Project created');
    return project;
  }

  /**
   * Full replace: omitted logo/details become null and the document list is
   * cleared and re-attached from `spec.documents`.
   */
  async update(projectId: number, spec: ProjectSpec): Promise<ProjectView> {
    const project = await this.db.transaction(async (tx) => {
      const [updated] = await tx
        .update(projects)
        .set({
          name: spec.name,
          logo_url: spec.logo ?? null,
          details: spec.details ?? null,
          updated_at: new Date(),
        })
        .where(eq(projects.id, projectId))
        .returning({ id: projects.id });
      if (!updated) {throw new ProjectNotFoundException();}

      await tx.delete(documents).where(eq(documents.project_id, projectId));
      await this.attachDocuments(tx, projectId, spec.documents ?? []);

      return this.loadOrThrow(tx, projectId);
    });

    this.logger.log({ projectId }, 'Project updated');
    return project;
  }

  /** Deletes the project together with its memberships and documents. */
  async remove(projectId: number): Promise<void> {
    await this.db.transaction(async (tx) => {
      const members = await this.membersService.removeAllForProject(projectId, tx);
      await tx.delete(documents).where(eq(documents.project_id, projectId));
      const deleted = await tx
        .delete(projects)
        .where(eq(projects.id, projectId))
        .returning({ id: projects.id });
      if (deleted.length === 0) {throw new ProjectNotFoundException();}
      this.logger.log({ projectId, members }, 'Project deleted');
    });
  }

  async addDocument(projectId: number, url: string): Promise<DocumentView> {
    try {
      const [created] = await this.db
        .insert(documents)
        .values({ project_id: projectId, url })
        .returning(DOCUMENT_COLUMNS);
      return created;
    } catch (err) {
      if (isPgForeignKeyViolation(err)) {
        throw new ProjectNotFoundException();
      }
      throw err;
    }
  }

  async listDocumentUrls(projectId: number): Promise<string[]> {
    const project = await this.getById(projectId);
    return project.documents.map((doc) => doc.url);
  }

  private async attachDocuments(db: Database, projectId: number, urls: string[]): Promise<void> {
    if (urls.length === 0) {return;}
    await db.insert(documents).values(urls.map((url) => ({ project_id: projectId, url })));
  }

  private async loadOrThrow(db: Database, projectId: number): Promise<ProjectView> {
    const project = await this.get(projectId, db);
    if (!project) {throw new ProjectNotFoundException();}
    return project;
  }
}
