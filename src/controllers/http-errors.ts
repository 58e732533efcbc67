import { BadRequestException, ConflictException, HttpException, NotFoundException } from '@nestjs/common';
import { IllegalTransitionError } from '../models/appointment-status';
import { QueryCatalogError, UnknownQueryError } from '../services/query-catalog.service';
import { SourceNotEmptyError } from '../services/seed.service';
import { DataFileError } from '../utils/data-files';

/** Maps domain errors onto HTTP exceptions; anything else is returned unchanged. */
export function toHttpError(error: unknown): unknown {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof UnknownQueryError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof SourceNotEmptyError) {
    return new ConflictException(error.message);
  }
  if (
    error instanceof IllegalTransitionError ||
    error instanceof DataFileError ||
    error instanceof QueryCatalogError
  ) {
    return new BadRequestException(error.message);
  }
  return error;
}
