import { BadRequestException } from '@nestjs/common';
import { SummaryStatus } from '../enums/summary-status.enum';

/**
 * Summary State Machine Utility
 *
 * Valid Transitions:
 * - RECEIVED → EXTRACTING (automatic, system)
 * - RECEIVED → FAILED (automatic, system)
 * - EXTRACTING → SUMMARIZED (automatic, system)
 * - EXTRACTING → FAILED (automatic, system)
 * - SUMMARIZED → EXTRACTING (re-process)
 * - FAILED → EXTRACTING (retry)
 */
export class SummaryStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    SummaryStatus,
    SummaryStatus[]
  > = new Map([
    [
      SummaryStatus.RECEIVED,
      [SummaryStatus.EXTRACTING, SummaryStatus.FAILED],
    ],
    [
      SummaryStatus.EXTRACTING,
      [SummaryStatus.SUMMARIZED, SummaryStatus.FAILED],
    ],
    [SummaryStatus.SUMMARIZED, [SummaryStatus.EXTRACTING]], // Re-processing
    [SummaryStatus.FAILED, [SummaryStatus.EXTRACTING]], // Retry
  ]);

  static isValidTransition(
    fromStatus: SummaryStatus,
    toStatus: SummaryStatus,
  ): boolean {
    // Same state is always valid (idempotent)
    if (fromStatus === toStatus) {
      return true;
    }

    const validTargets = this.VALID_TRANSITIONS.get(fromStatus);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(toStatus);
  }

  /**
   * @throws BadRequestException if transition is invalid
   */
  static validateTransition(
    fromStatus: SummaryStatus,
    toStatus: SummaryStatus,
  ): void {
    if (!this.isValidTransition(fromStatus, toStatus)) {
      throw new BadRequestException(
        `Invalid state transition: ${fromStatus} → ${toStatus}. ` +
          `Valid transitions from ${fromStatus}: ${this.getValidTargetStates(fromStatus).join(', ') || 'none'}`,
      );
    }
  }

  static getValidTargetStates(fromStatus: SummaryStatus): SummaryStatus[] {
    return this.VALID_TRANSITIONS.get(fromStatus) || [];
  }

  static canReprocess(status: SummaryStatus): boolean {
    return (
      status === SummaryStatus.SUMMARIZED || status === SummaryStatus.FAILED
    );
  }
}
