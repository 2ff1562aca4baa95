import {
  BadRequestException,
  ConflictException,
  HttpException,
  InternalServerErrorException,
} from '@nestjs/common';
import { isLoanDomainError } from './domain.errors';

export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  if (isLoanDomainError(error)) {
    switch (error.kind) {
      case 'INVALID_CONSTRUCTION':
      case 'INVALID_PAYMENT':
        return new BadRequestException(error.message);
      case 'INVALID_STATE_TRANSITION':
        return new ConflictException(error.message);
      case 'DISTRIBUTION_INCONSISTENCY':
        return new InternalServerErrorException('Payment allocation failed');
    }
  }

  return new InternalServerErrorException('Unexpected loan processing failure');
}

export function errorDetails(error: unknown): { message: string; stack?: string; code?: string } {
  if (isLoanDomainError(error)) {
    return { message: error.message, stack: error.stack, code: error.kind };
  }
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
