import { BadRequestException, ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { toHttpError } from './http-errors';
import { AppointmentStatus, IllegalTransitionError } from '../models/appointment-status';
import { QueryCatalogError, UnknownQueryError } from '../services/query-catalog.service';
import { SourceNotEmptyError } from '../services/seed.service';
import { DataFileError } from '../utils/data-files';

describe('toHttpError', () => {
  it('should keep HTTP exceptions as they are', () => {
    const error = new ForbiddenException();
    expect(toHttpError(error)).toBe(error);
  });

  it('should map an unknown query to 404', () => {
    const mapped = toHttpError(new UnknownQueryError('missing'));
    expect(mapped).toBeInstanceOf(NotFoundException);
    expect(mapped).toMatchObject({ message: 'Unknown warehouse query "missing"' });
  });

  it('should map populated source tables to 409', () => {
    const mapped = toHttpError(new SourceNotEmptyError({ patients: 3, doctors: 0, appointments: 0, visits: 0 }));
    expect(mapped).toBeInstanceOf(ConflictException);
    expect(mapped).toMatchObject({
      message: 'Source tables already hold data (patients=3); run "source init" before seeding',
    });
  });

  it.each([
    new IllegalTransitionError(AppointmentStatus.COMPLETED, AppointmentStatus.SCHEDULED),
    new DataFileError('/tmp/scenario.json', ['steps: steps must contain at least 1 elements']),
    new QueryCatalogError('q.sql: query body is empty'),
  ])('should map %p to 400', (error) => {
    const mapped = toHttpError(error);
    expect(mapped).toBeInstanceOf(BadRequestException);
    expect(mapped).toMatchObject({ message: error.message });
  });

  it('should pass other errors through', () => {
    const error = new Error('connection refused');
    expect(toHttpError(error)).toBe(error);
  });
});
