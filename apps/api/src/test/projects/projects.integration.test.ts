import { describe, it, expect, beforeAll } from 'vitest';
import { eq } from 'drizzle-orm';
import { setupTestDatabase, createTestUser, addTestMember, type TestDatabaseContext } from '@crewdesk/testing';
import { documents, projectUsers } from '@crewdesk/db';
import { ProjectsService, toProjectInfo } from '../../projects/projects.service';
import { MembersService } from '../../members/members.service';
import { ProjectNotFoundException } from '../../projects/exceptions/project-not-found.exception';

let ctx: TestDatabaseContext;
let members: MembersService;
let service: ProjectsService;

beforeAll(async () => {
  ctx = await setupTestDatabase();
  members = new MembersService(ctx.db);
  service = new ProjectsService(ctx.db, members);
});

describe('ProjectsService.create', () => {
  it('stores the project with its documents in order', async () => {
    const { userId } = await createTestUser(ctx.db);

    const project = await service.create(userId, {
      name: 'Apollo',
      logo: 'https://cdn.test/logo.png',
      details: 'Moonshot',
      documents: ['u1', 'u2'],
    });

    expect(project).toEqual({
      id: expect.any(Number),
      name: 'Apollo',
      logo: 'https://cdn.test/logo.png',
      details: 'Moonshot',
      documents: [
        { id: expect.any(Number), project_id: project.id, url: 'u1' },
        { id: expect.any(Number), project_id: project.id, url: 'u2' },
      ],
    });
  });

  it('makes the creator the owner', async () => {
    const { userId } = await createTestUser(ctx.db);

    const project = await service.create(userId, { name: 'Owned' });

    expect(await members.getMembership(userId, project.id)).toEqual({ id: expect.any(Number), is_owner: true });
  });

  it('defaults logo and details to null and documents to empty', async () => {
    const { userId } = await createTestUser(ctx.db);

    const project = await service.create(userId, { name: 'Bare' });

    expect(project.logo).toBeNull();
    expect(project.details).toBeNull();
    expect(project.documents).toEqual([]);
  });

  it('rolls the project back when the owner cannot be added', async () => {
    const before = await service.list();

    await expect(service.create(2_000_000_000, { name: 'Orphan', documents: ['u1'] })).rejects.toThrow();

    expect((await service.list()).map((p) => p.id)).toEqual(before.map((p) => p.id));
  });
});

describe('ProjectsService.update', () => {
  it('replaces every field, including the document list', async () => {
    const { userId } = await createTestUser(ctx.db);
    const created = await service.create(userId, {
      name: 'A',
      logo: 'https://cdn.test/a.png',
      details: 'first',
      documents: ['u1', 'u2'],
    });

    await service.update(created.id, { name: 'A', documents: ['u3'] });
    const project = await service.getById(created.id);

    expect(project.name).toBe('A');
    expect(project.logo).toBeNull();
    expect(project.details).toBeNull();
    expect(project.documents.map((doc) => doc.url)).toEqual(['u3']);
  });

  it('returns the updated project', async () => {
    const { userId } = await createTestUser(ctx.db);
    const created = await service.create(userId, { name: 'Before' });

    const updated = await service.update(created.id, { name: 'After', details: 'new' });

    expect(toProjectInfo(updated)).toEqual({
      id: created.id,
      name: 'After',
      logo: null,
      details: 'new',
      documents: [],
    });
  });

  it('throws ProjectNotFoundException for an unknown id', async () => {
    await expect(service.update(2_000_000_000, { name: 'Ghost' })).rejects.toThrow(ProjectNotFoundException);
  });
});

describe('ProjectsService.remove', () => {
  it('removes the project with its memberships and documents', async () => {
    const { userId } = await createTestUser(ctx.db);
    const { userId: memberId } = await createTestUser(ctx.db);
    const project = await service.create(userId, { name: 'Doomed', documents: ['u1', 'u2'] });
    await addTestMember(ctx.db, project.id, memberId);

    await service.remove(project.id);

    expect(await service.get(project.id)).toBeNull();
    expect(await members.membersOf(project.id)).toEqual([]);
    expect(await ctx.db.select().from(documents).where(eq(documents.project_id, project.id))).toEqual([]);
    expect(await ctx.db.select().from(projectUsers).where(eq(projectUsers.project_id, project.id))).toEqual([]);
  });

  it('throws ProjectNotFoundException for an unknown id', async () => {
    await expect(service.remove(2_000_000_000)).rejects.toThrow(ProjectNotFoundException);
  });
});

describe('ProjectsService reads', () => {
  it('get returns null and getById throws for an unknown id', async () => {
    expect(await service.get(2_000_000_000)).toBeNull();
    await expect(service.getById(2_000_000_000)).rejects.toThrow(ProjectNotFoundException);
  });

  it('list includes each project with its own documents', async () => {
    const { userId } = await createTestUser(ctx.db);
    const first = await service.create(userId, { name: 'One', documents: ['a'] });
    const { userId: otherId } = await createTestUser(ctx.db);
    const second = await service.create(otherId, { name: 'Two', documents: ['b', 'c'] });

    const listed = await service.list();
    const byId = new Map(listed.map((p) => [p.id, p.documents.map((doc) => doc.url)]));

    expect(byId.get(first.id)).toEqual(['a']);
    expect(byId.get(second.id)).toEqual(['b', 'c']);
  });

  it('addDocument appends to listDocumentUrls', async () => {
    const { userId } = await createTestUser(ctx.db);
    const project = await service.create(userId, { name: 'Docs', documents: ['u1'] });

    await service.addDocument(project.id, 'u2');

    expect(await service.listDocumentUrls(project.id)).toEqual(['u1', 'u2']);
  });

  it('addDocument throws ProjectNotFoundException for an unknown project', async () => {
    await expect(service.addDocument(2_000_000_000, 'u')).rejects.toThrow(ProjectNotFoundException);
  });
});
