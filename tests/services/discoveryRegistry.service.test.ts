import { DiscoveryRegistry } from '../../src/main/services/discoveryRegistry.service';
import { TransferStore } from '../../src/main/repository/transferRegistry.repository';
import { OutboundTransferState, ProtocolState } from '../../src/main/interfaces/transfer.interface';
import { endpoint, outboundEvent } from '../helpers/fixtures';

jest.mock('../../src/main/utils/logger');

describe('DiscoveryRegistry', () => {
  let store: TransferStore;
  let registry: DiscoveryRegistry;

  beforeEach(() => {
    store = new TransferStore();
    registry = new DiscoveryRegistry(store);
  });

  afterEach(() => {
    store.clear();
  });

  it('should add a session for a new endpoint', async () => {
    expect(await registry.upsert(endpoint('dev1'))).toBe('added');

    const session = store.outbound.peek('dev1');
    expect(session?.transferState).toBe(OutboundTransferState.AwaitingConsentOrIdle);
    expect(registry.get('dev1')).toEqual(endpoint('dev1'));
  });

  it('should keep one session per endpoint with the latest presence', async () => {
    await registry.upsert(endpoint('dev1', { present: true }));
    expect(await registry.upsert(endpoint('dev1', { present: false }))).toBe('updated');

    expect(store.outbound.size).toBe(1);
    expect(store.outbound.peek('dev1')?.isPresent).toBe(false);
    expect(registry.get('dev1')?.present).toBe(false);
    expect(registry.size).toBe(1);
  });

  it('should put newly found endpoints first', async () => {
    await registry.upsert(endpoint('dev1'));
    await registry.upsert(endpoint('dev2'));
    await registry.upsert(endpoint('dev1', { name: 'Renamed' }));

    expect(store.outbound.list().map((session) => session.id)).toEqual(['dev2', 'dev1']);
    expect(store.outbound.peek('dev1')?.deviceName).toBe('Renamed');
  });

  it('should keep the transfer state of a known endpoint', async () => {
    await registry.upsert(endpoint('dev1'));
    await store.outbound.applyEvent(outboundEvent('dev1', ProtocolState.SentIntroduction));

    await registry.upsert(endpoint('dev1', { port: 5000 }));

    expect(store.outbound.peek('dev1')?.transferState).toBe(OutboundTransferState.RequestedForConsent);
    expect(store.outbound.peek('dev1')?.endpoint.port).toBe(5000);
  });

  it('should notify observers with the presentation list', async () => {
    const listener = jest.fn();
    registry.onRecipientsChanged(listener);

    await registry.upsert(endpoint('dev1'));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].map((session: { id: string }) => session.id)).toEqual(['dev1']);
  });

  it('should forget endpoint records', async () => {
    await registry.upsert(endpoint('dev1'));
    await registry.upsert(endpoint('dev2'));

    expect(registry.forget(['dev1', 'unknown'])).toBe(1);
    expect(registry.list().map((info) => info.id)).toEqual(['dev2']);
  });
});
