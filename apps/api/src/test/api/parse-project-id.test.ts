import { describe, it, expect } from 'vitest';
import { parseProjectId, ParseProjectIdPipe } from '../../api/pipes/parse-project-id.pipe';
import { AppBadRequestException } from '../../exceptions/app-bad-request.exception';
import { ProjectNotFoundException } from '../../projects/exceptions/project-not-found.exception';

describe('parseProjectId', () => {
  it('accepts a positive id as a string or a number', () => {
    expect(parseProjectId('42')).toBe(42);
    expect(parseProjectId(42)).toBe(42);
  });

  it('accepts the largest serial id', () => {
    expect(parseProjectId('2147483647')).toBe(2147483647);
  });

  it.each(['abc', Number.NaN, '0', '-1', '1.5', ''])('rejects %s as a bad request', (value) => {
    expect(() => parseProjectId(value)).toThrow(AppBadRequestException);
  });

  it('treats ids past the serial range as unknown projects', () => {
    expect(() => parseProjectId('2147483648')).toThrow(ProjectNotFoundException);
    expect(() => parseProjectId(3000000000)).toThrow(ProjectNotFoundException);
  });
});

describe('ParseProjectIdPipe', () => {
  it('parses the route param', () => {
    expect(new ParseProjectIdPipe().transform('7')).toBe(7);
  });
});
