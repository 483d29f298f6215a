import { InboundOutcome, InboundSession } from '../../src/main/models/inboundSession.model';
import { ProtocolState, TransferAction } from '../../src/main/interfaces/transfer.interface';
import { ERROR_TYPES } from '../../src/main/utils/constants';
import { isCoordinatorError } from '../../src/main/utils/errors';
import { filesMetadata, inboundEvent, textMetadata } from '../helpers/fixtures';

jest.mock('../../src/main/utils/logger');

const CONSENT_TIMEOUT_MS = 60_000;

function createSession(metadata = filesMetadata(['photo.jpg', 'notes.txt'], 10_000)): InboundSession {
  return new InboundSession(inboundEvent('t1', ProtocolState.WaitingForUserConsent, metadata), {
    consentTimeoutMs: CONSENT_TIMEOUT_MS,
    notificationId: 'notification-1',
    clock: () => Date.now(),
  });
}

function expectInvalidAction(fn: () => void): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(isCoordinatorError(caught, ERROR_TYPES.INVALID_ACTION)).toBe(true);
}

describe('InboundSession', () => {
  let session: InboundSession;

  beforeEach(() => {
    jest.useFakeTimers();
    session = createSession();
  });

  afterEach(() => {
    session.dispose();
    jest.useRealTimers();
  });

  describe('Creation', () => {
    it('should start waiting for consent', () => {
      expect(session.snapshot()).toEqual({
        transferId: 't1',
        notificationId: 'notification-1',
        deviceName: 'Pixel',
        protocolState: ProtocolState.WaitingForUserConsent,
        userAction: undefined,
        userCancelled: false,
        closed: false,
        progress: undefined,
      });
      expect(session.isAwaitingConsent).toBe(true);
      expect(session.eta.totalLen).toBe(10_000);
    });

    it('should generate a notification id when none is given', () => {
      const generated = new InboundSession(inboundEvent('t2', ProtocolState.WaitingForUserConsent));
      expect(generated.notificationId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(generated.deviceName).toBe('Unknown device');
      generated.dispose();
    });
  });

  describe('Auto-decline', () => {
    it('should decline exactly once when nobody answers', () => {
      const actions = jest.fn();
      const timedOut = jest.fn();
      session.onUserAction(actions);
      session.onTimedOut(timedOut);
      session.armAutoDecline();

      jest.advanceTimersByTime(CONSENT_TIMEOUT_MS - 1);
      expect(actions).not.toHaveBeenCalled();

      jest.advanceTimersByTime(1);
      jest.advanceTimersByTime(CONSENT_TIMEOUT_MS * 2);

      expect(actions).toHaveBeenCalledTimes(1);
      expect(actions).toHaveBeenCalledWith(TransferAction.ConsentDecline, 'timeout');
      expect(timedOut).toHaveBeenCalledTimes(1);
      expect(session.userAction).toBe(TransferAction.ConsentDecline);
      expect(session.isAutoDeclineArmed).toBe(false);
    });

    it('should never fire after an accept just before the deadline', () => {
      const timedOut = jest.fn();
      session.onTimedOut(timedOut);
      session.armAutoDecline();

      jest.advanceTimersByTime(59_900);
      session.setUserAction(TransferAction.ConsentAccept);
      jest.advanceTimersByTime(CONSENT_TIMEOUT_MS);

      expect(timedOut).not.toHaveBeenCalled();
      expect(session.userAction).toBe(TransferAction.ConsentAccept);
    });

    it('should be cancelled by a later event of the same transfer', () => {
      const timedOut = jest.fn();
      session.onTimedOut(timedOut);
      session.armAutoDecline();

      session.applyEvent(inboundEvent('t1', ProtocolState.ReceivingFiles, filesMetadata(['a'], 10_000, 0)));
      jest.advanceTimersByTime(CONSENT_TIMEOUT_MS);

      expect(session.isAutoDeclineArmed).toBe(false);
      expect(timedOut).not.toHaveBeenCalled();
      expect(session.userAction).toBeUndefined();
    });

    it('should keep running when the consent request is repeated', () => {
      session.armAutoDecline();

      session.applyEvent(inboundEvent('t1', ProtocolState.WaitingForUserConsent, filesMetadata(['a'], 10_000)));
      jest.advanceTimersByTime(CONSENT_TIMEOUT_MS);

      expect(session.userAction).toBe(TransferAction.ConsentDecline);
    });

    it('should allow cancelling twice', () => {
      session.armAutoDecline();
      session.cancelAutoDecline();
      session.cancelAutoDecline();
      jest.advanceTimersByTime(CONSENT_TIMEOUT_MS);

      expect(session.userAction).toBeUndefined();
    });
  });

  describe('User actions', () => {
    it('should accept once', () => {
      const actions = jest.fn();
      session.onUserAction(actions);

      session.setUserAction(TransferAction.ConsentAccept, 'notification');

      expect(actions).toHaveBeenCalledWith(TransferAction.ConsentAccept, 'notification');
      expectInvalidAction(() => session.setUserAction(TransferAction.ConsentDecline));
      expectInvalidAction(() => session.setUserAction(TransferAction.ConsentAccept));
    });

    it('should only cancel after accepting', () => {
      expect(session.canApply(TransferAction.TransferCancel)).toBe(false);
      expectInvalidAction(() => session.setUserAction(TransferAction.TransferCancel));

      session.setUserAction(TransferAction.ConsentAccept);
      session.setUserAction(TransferAction.TransferCancel);

      expect(session.userAction).toBe(TransferAction.TransferCancel);
      expect(session.userCancelled).toBe(true);
    });

    it('should not cancel after declining', () => {
      session.setUserAction(TransferAction.ConsentDecline);
      expectInvalidAction(() => session.setUserAction(TransferAction.TransferCancel));
    });
  });

  describe('Events', () => {
    it('should ignore events of another transfer', () => {
      const changed = jest.fn();
      session.onChanged(changed);

      expect(session.applyEvent(inboundEvent('t9', ProtocolState.Finished))).toBe(false);

      expect(changed).not.toHaveBeenCalled();
      expect(session.isClosed).toBe(false);
    });

    it('should step the estimator while receiving files', () => {
      session.applyEvent(inboundEvent('t1', ProtocolState.ReceivingFiles, filesMetadata(['a'], 10_000, 0)));
      jest.advanceTimersByTime(1000);
      session.applyEvent(inboundEvent('t1', ProtocolState.ReceivingFiles, filesMetadata(['a'], 10_000, 2500)));

      expect(session.eta.transferred).toBe(2500);
      expect(session.eta.recentDeltas).toEqual([2500]);
      expect(session.progress).toBe(0.25);
    });

    it('should not step the estimator for text', () => {
      const text = createSession(textMetadata('hello'));
      text.applyEvent(inboundEvent('t1', ProtocolState.ReceivingFiles, textMetadata('hello', { ackBytes: 5 })));

      expect(text.eta.transferred).toBe(0);
      text.dispose();
    });

    it('should close once on a terminal event', () => {
      const closed = jest.fn();
      session.onClosed(closed);

      expect(session.applyEvent(inboundEvent('t1', ProtocolState.Finished))).toBe(true);
      expect(session.applyEvent(inboundEvent('t1', ProtocolState.Disconnected))).toBe(false);
      session.close(InboundOutcome.Shutdown);

      expect(closed).toHaveBeenCalledTimes(1);
      expect(closed).toHaveBeenCalledWith(InboundOutcome.Finished);
      expect(session.isClosed).toBe(true);
      expect(session.isAwaitingConsent).toBe(false);
      expect(session.canApply(TransferAction.ConsentAccept)).toBe(false);
    });

    it('should tell a user cancel from a sender cancel', () => {
      const byUser = jest.fn();
      session.onClosed(byUser);
      session.setUserAction(TransferAction.ConsentAccept);
      session.setUserAction(TransferAction.TransferCancel);
      session.applyEvent(inboundEvent('t1', ProtocolState.Cancelled));
      expect(byUser).toHaveBeenCalledWith(InboundOutcome.CancelledByUser);

      const other = createSession();
      const bySender = jest.fn();
      other.onClosed(bySender);
      other.setUserAction(TransferAction.ConsentAccept);
      other.applyEvent(inboundEvent('t1', ProtocolState.Cancelled));
      expect(bySender).toHaveBeenCalledWith(InboundOutcome.CancelledBySender);
      other.dispose();
    });

    it.each([
      [ProtocolState.Disconnected, InboundOutcome.Disconnected],
      [ProtocolState.Rejected, InboundOutcome.Rejected],
    ])('should map %s to %s', (state, outcome) => {
      const closed = jest.fn();
      session.onClosed(closed);

      session.applyEvent(inboundEvent('t1', state));

      expect(closed).toHaveBeenCalledWith(outcome);
    });

    it('should disarm the timer on close', () => {
      session.armAutoDecline();
      session.close(InboundOutcome.Shutdown);
      jest.advanceTimersByTime(CONSENT_TIMEOUT_MS);

      expect(session.userAction).toBeUndefined();
    });
  });
});
