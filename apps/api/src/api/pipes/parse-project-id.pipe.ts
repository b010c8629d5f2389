import { Injectable, PipeTransform } from '@nestjs/common';
import { AppBadRequestException } from '../../exceptions/app-bad-request.exception';
import { ProjectNotFoundException } from '../../projects/exceptions/project-not-found.exception';
import { PG_INT4_MAX } from '../../constants';

/**
 * Accepts a positive decimal id. Ids past the serial range cannot name a
 * project, so they answer 404 like any other unknown id.
 */
export function parseProjectId(value: unknown): number {
  const raw = String(value);
  if (!/^\d+$/.test(raw)) {
    throw new AppBadRequestException('A numeric project id is required');
  }
  const id = Number(raw);
  if (id === 0) {
    throw new AppBadRequestException('A numeric project id is required');
  }
  if (id > PG_INT4_MAX) {
    throw new ProjectNotFoundException();
  }
  return id;
}

@Injectable()
export class ParseProjectIdPipe implements PipeTransform<unknown, number> {
  transform(value: unknown): number {
    return parseProjectId(value);
  }
}
