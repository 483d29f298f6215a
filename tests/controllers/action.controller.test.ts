import { EventEmitter } from 'events';
import {
  cleanupActionHandlers,
  getSelectedFiles,
  setupActionHandlers,
} from '../../src/main/controllers/action.controller';
import { TransferCoordinator } from '../../src/main/services/transferCoordinator.service';
import { Visibility } from '../../src/main/interfaces/engine.interface';
import { DesktopLauncher } from '../../src/main/interfaces/integration.interface';
import { ProtocolState, TransferAction } from '../../src/main/interfaces/transfer.interface';
import { logger } from '../../src/main/utils/logger';
import { FakeEngine } from '../helpers/fakeEngine';
import { filesMetadata, flush, inboundEvent } from '../helpers/fixtures';

jest.mock('../../src/main/utils/logger');

describe('Action Controller', () => {
  let bus: EventEmitter;
  let engine: FakeEngine;
  let coordinator: TransferCoordinator;
  let launcher: { openFolder: jest.Mock; copyText: jest.Mock };

  async function requestConsent(): Promise<void> {
    engine.emit(inboundEvent('t1', ProtocolState.WaitingForUserConsent, filesMetadata(['a.txt'], 10)));
    await flush();
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    bus = new EventEmitter();
    engine = new FakeEngine();
    coordinator = new TransferCoordinator(engine, {
      settings: { deviceName: 'Desk', visibility: Visibility.Visible, downloadDir: '/downloads' },
      measureFiles: async () => 0,
    });
    launcher = {
      openFolder: jest.fn().mockResolvedValue(undefined),
      copyText: jest.fn().mockResolvedValue(undefined),
    };
    const desktop: DesktopLauncher = launcher;
    setupActionHandlers(bus, coordinator, desktop);
    await coordinator.start();
  });

  afterEach(async () => {
    cleanupActionHandlers();
    await coordinator.shutdown();
  });

  describe('Consent actions', () => {
    it('should accept the pending request', async () => {
      await requestConsent();

      bus.emit('consent-accept');
      await flush();

      expect(engine.published).toEqual([{ id: 't1', kind: 'lib', action: TransferAction.ConsentAccept }]);
    });

    it('should decline the pending request', async () => {
      await requestConsent();

      bus.emit('consent-decline');
      await flush();

      expect(engine.published).toEqual([{ id: 't1', kind: 'lib', action: TransferAction.ConsentDecline }]);
    });

    it('should log a response with no pending request', async () => {
      bus.emit('consent-accept');
      await flush();

      expect(logger.error).toHaveBeenCalledWith(
        'Failed to handle consent-accept:',
        'No transfer request is waiting for consent'
      );
      expect(engine.published).toHaveLength(0);
    });
  });

  describe('transfer-cancel', () => {
    it('should cancel the transfer being received', async () => {
      await requestConsent();
      bus.emit('consent-accept');
      await flush();

      bus.emit('transfer-cancel');
      await flush();

      expect(engine.published.map((message) => (message.kind === 'lib' ? message.action : ''))).toEqual([
        TransferAction.ConsentAccept,
        TransferAction.TransferCancel,
      ]);
    });

    it('should warn when nothing is being received', async () => {
      bus.emit('transfer-cancel');
      await flush();

      expect(logger.warn).toHaveBeenCalledWith('Transfer cancel requested but nothing is being received');
    });
  });

  describe('Desktop actions', () => {
    it('should open the given folder or the download folder', async () => {
      bus.emit('open-folder', '/tmp/shared');
      bus.emit('open-folder');
      await flush();

      expect(launcher.openFolder).toHaveBeenNthCalledWith(1, '/tmp/shared');
      expect(launcher.openFolder).toHaveBeenNthCalledWith(2, '/downloads');
    });

    it('should copy received text', async () => {
      bus.emit('copy-text', 'hello there');
      await flush();

      expect(launcher.copyText).toHaveBeenCalledWith('hello there');
    });

    it('should warn when there is no launcher', async () => {
      setupActionHandlers(bus, coordinator);

      bus.emit('copy-text', 'hello there');
      await flush();

      expect(logger.warn).toHaveBeenCalledWith('No desktop launcher to copy text');
      expect(launcher.copyText).not.toHaveBeenCalled();
    });
  });

  describe('send-files', () => {
    it('should keep the selection and start discovery', async () => {
      bus.emit('send-files', ['/tmp/a.txt', '/tmp/b.txt', '/tmp/a.txt']);
      await flush();

      expect(getSelectedFiles()).toEqual(['/tmp/a.txt', '/tmp/b.txt']);
      expect(engine.discoveryStarts).toBe(1);
      expect(coordinator.isDiscovering).toBe(true);
    });

    it('should ignore a malformed file list', async () => {
      bus.emit('send-files', '/tmp/a.txt');
      await flush();

      expect(logger.warn).toHaveBeenCalledWith('send-files action expects a list of paths');
      expect(getSelectedFiles()).toEqual([]);
    });
  });

  describe('cleanupActionHandlers', () => {
    it('should remove every bus listener and the selection', async () => {
      bus.emit('send-files', ['/tmp/a.txt']);
      await flush();

      cleanupActionHandlers();

      expect(bus.listenerCount('consent-accept')).toBe(0);
      expect(bus.listenerCount('send-files')).toBe(0);
      expect(getSelectedFiles()).toEqual([]);
    });
  });
});
