import { UnprocessableEntityException } from '@nestjs/common';

/**
 * Raised when a persisted summary fails extraction or artifact writes.
 * The record has already been moved to FAILED with `reason`.
 */
export class SummaryGenerationException extends UnprocessableEntityException {
  constructor(
    public readonly summaryId: string,
    public readonly reason: string,
  ) {
    super(`Summary ${summaryId} could not be generated: ${reason}`);
  }
}
