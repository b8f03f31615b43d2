import { BadRequestException } from '@nestjs/common';
import { SummaryStateMachine } from './summary-state-machine.util';
import { SummaryStatus } from '../enums/summary-status.enum';

describe('SummaryStateMachine', () => {
  describe('isValidTransition', () => {
    it('should allow the forward lifecycle', () => {
      expect(
        SummaryStateMachine.isValidTransition(
          SummaryStatus.RECEIVED,
          SummaryStatus.EXTRACTING,
        ),
      ).toBe(true);
      expect(
        SummaryStateMachine.isValidTransition(
          SummaryStatus.EXTRACTING,
          SummaryStatus.SUMMARIZED,
        ),
      ).toBe(true);
    });

    it('should allow re-processing from SUMMARIZED and FAILED', () => {
      expect(
        SummaryStateMachine.isValidTransition(
          SummaryStatus.SUMMARIZED,
          SummaryStatus.EXTRACTING,
        ),
      ).toBe(true);
      expect(
        SummaryStateMachine.isValidTransition(
          SummaryStatus.FAILED,
          SummaryStatus.EXTRACTING,
        ),
      ).toBe(true);
    });

    it('should treat same-state transitions as idempotent', () => {
      expect(
        SummaryStateMachine.isValidTransition(
          SummaryStatus.SUMMARIZED,
          SummaryStatus.SUMMARIZED,
        ),
      ).toBe(true);
    });

    it('should reject skipping extraction', () => {
      expect(
        SummaryStateMachine.isValidTransition(
          SummaryStatus.RECEIVED,
          SummaryStatus.SUMMARIZED,
        ),
      ).toBe(false);
      expect(
        SummaryStateMachine.isValidTransition(
          SummaryStatus.SUMMARIZED,
          SummaryStatus.FAILED,
        ),
      ).toBe(false);
    });
  });

  describe('validateTransition', () => {
    it('should throw BadRequestException listing valid targets', () => {
      expect(() =>
        SummaryStateMachine.validateTransition(
          SummaryStatus.FAILED,
          SummaryStatus.SUMMARIZED,
        ),
      ).toThrow(
        new BadRequestException(
          'Invalid state transition: FAILED → SUMMARIZED. Valid transitions from FAILED: EXTRACTING',
        ),
      );
    });
  });

  describe('canReprocess', () => {
    it('should only allow finished summaries', () => {
      expect(SummaryStateMachine.canReprocess(SummaryStatus.FAILED)).toBe(true);
      expect(SummaryStateMachine.canReprocess(SummaryStatus.SUMMARIZED)).toBe(
        true,
      );
      expect(SummaryStateMachine.canReprocess(SummaryStatus.EXTRACTING)).toBe(
        false,
      );
    });
  });
});
