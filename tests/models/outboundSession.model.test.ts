import { OutboundSession, OutboundStateChange } from '../../src/main/models/outboundSession.model';
import { OutboundTransferState, ProtocolState } from '../../src/main/interfaces/transfer.interface';
import { endpoint, filesMetadata, outboundEvent } from '../helpers/fixtures';

jest.mock('../../src/main/utils/logger');

describe('OutboundSession', () => {
  let now: number;
  const clock = () => now;
  let session: OutboundSession;

  beforeEach(() => {
    now = 0;
    session = new OutboundSession(endpoint('dev1'), clock);
  });

  afterEach(() => {
    session.dispose();
  });

  describe('Initial state', () => {
    it('should default to awaiting consent or idle', () => {
      expect(session.transferState).toBe(OutboundTransferState.AwaitingConsentOrIdle);
      expect(session.event).toBeUndefined();
      expect(session.canSend()).toBe(true);
      expect(session.isActive()).toBe(false);
      expect(session.isEngineBusy()).toBe(false);
    });

    it('should expose a plain snapshot', () => {
      session.setFiles(['/tmp/a.txt'], 10);

      expect(session.snapshot()).toEqual({
        id: 'dev1',
        deviceName: 'Device dev1',
        present: true,
        files: ['/tmp/a.txt'],
        transferState: OutboundTransferState.AwaitingConsentOrIdle,
        protocolState: undefined,
        pinCode: undefined,
        progress: undefined,
      });
    });

    it('should fall back to a generic device name', () => {
      const unnamed = new OutboundSession({ id: 'dev2', present: true });
      expect(unnamed.deviceName).toBe('Unknown device');
    });
  });

  describe('Transitions', () => {
    it('should go through ongoing transfer to done in order', () => {
      const changes: OutboundStateChange[] = [];
      session.onChanged((change) => changes.push(change));

      session.applyEvent(outboundEvent('dev1', ProtocolState.SendingFiles, filesMetadata(['a'], 100, 10)));
      session.applyEvent(outboundEvent('dev1', ProtocolState.Finished, filesMetadata(['a'], 100, 100)));

      expect(changes.map(({ previous, current }) => [previous, current])).toEqual([
        [OutboundTransferState.AwaitingConsentOrIdle, OutboundTransferState.OngoingTransfer],
        [OutboundTransferState.OngoingTransfer, OutboundTransferState.Done],
      ]);
      expect(session.transferState).toBe(OutboundTransferState.Done);
      expect(session.canSend()).toBe(true);
    });

    it.each([
      ProtocolState.SentUkeyClientInit,
      ProtocolState.SentUkeyClientFinish,
      ProtocolState.SentIntroduction,
    ])('should request consent on %s', (state) => {
      session.setFiles(['a'], 5000);
      session.applyEvent(outboundEvent('dev1', state, filesMetadata(['a'], 5000, 0, { pinCode: '1234' })));

      expect(session.transferState).toBe(OutboundTransferState.RequestedForConsent);
      expect(session.pinCode).toBe('1234');
      expect(session.isActive()).toBe(true);
      expect(session.isEngineBusy()).toBe(true);
      expect(session.canSend()).toBe(false);
    });

    it('should reset the estimator but keep its length on consent request', () => {
      session.setFiles(['a'], 5000);
      session.eta.stepWith(1000);

      session.applyEvent(outboundEvent('dev1', ProtocolState.SentIntroduction));

      expect(session.eta.totalLen).toBe(5000);
      expect(session.eta.transferred).toBe(0);
      expect(session.eta.isPristine).toBe(true);
    });

    it('should step the estimator on every sending event', () => {
      session.setFiles(['a'], 10_000);

      session.applyEvent(outboundEvent('dev1', ProtocolState.SendingFiles, filesMetadata(['a'], 10_000, 0)));
      now = 1000;
      session.applyEvent(outboundEvent('dev1', ProtocolState.SendingFiles, filesMetadata(['a'], 10_000, 1000)));

      expect(session.eta.transferred).toBe(1000);
      expect(session.etaText()).toBe('9 seconds');
      expect(session.progress).toBe(0.1);
    });

    it.each([ProtocolState.Disconnected, ProtocolState.Rejected])('should fail on %s', (state) => {
      session.applyEvent(outboundEvent('dev1', ProtocolState.SentIntroduction));
      session.applyEvent(outboundEvent('dev1', state));

      expect(session.transferState).toBe(OutboundTransferState.Failed);
      expect(session.isEngineBusy()).toBe(false);
      expect(session.canSend()).toBe(true);
    });

    it('should go back to idle and clear the event when cancelled', () => {
      session.applyEvent(outboundEvent('dev1', ProtocolState.SendingFiles, filesMetadata(['a'], 100, 10)));
      session.applyEvent(outboundEvent('dev1', ProtocolState.Cancelled));

      expect(session.transferState).toBe(OutboundTransferState.AwaitingConsentOrIdle);
      expect(session.event).toBeUndefined();
      expect(session.canSend()).toBe(true);
    });

    it('should record other states without changing the transfer state', () => {
      session.applyEvent(outboundEvent('dev1', ProtocolState.SentIntroduction));
      session.applyEvent(outboundEvent('dev1', ProtocolState.SentPairedKeyEncryption));

      expect(session.transferState).toBe(OutboundTransferState.RequestedForConsent);
      expect(session.event?.state).toBe(ProtocolState.SentPairedKeyEncryption);
    });

    it('should treat a missing state as initial', () => {
      session.applyEvent(outboundEvent('dev1'));

      expect(session.transferState).toBe(OutboundTransferState.AwaitingConsentOrIdle);
      expect(session.isEngineBusy()).toBe(false);
    });

    it('should mark the session queued', () => {
      session.markQueued();

      expect(session.transferState).toBe(OutboundTransferState.Queued);
      expect(session.isActive()).toBe(false);
      expect(session.canSend()).toBe(false);
    });
  });

  describe('Endpoint updates', () => {
    it('should take the latest endpoint record', () => {
      const seen: boolean[] = [];
      session.onEndpointChanged((info) => seen.push(info.present));

      session.updateEndpoint(endpoint('dev1', { present: false }));

      expect(session.isPresent).toBe(false);
      expect(session.canSend()).toBe(false);
      expect(seen).toEqual([false]);
    });

    it('should refuse a record for another endpoint', () => {
      expect(() => session.updateEndpoint(endpoint('dev9'))).toThrow(RangeError);
    });
  });

  describe('Observers', () => {
    it('should keep going when an observer throws', () => {
      const later = jest.fn();
      session.onChanged(() => {
        throw new Error('observer failed');
      });
      session.onChanged(later);

      expect(() => session.applyEvent(outboundEvent('dev1', ProtocolState.Finished))).not.toThrow();
      expect(later).toHaveBeenCalledTimes(1);
      expect(session.transferState).toBe(OutboundTransferState.Done);
    });

    it('should stop notifying after unsubscribe', () => {
      const listener = jest.fn();
      const unsubscribe = session.onChanged(listener);

      unsubscribe();
      session.markQueued();

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
