import {
  ServiceWorkerContainerLike,
  WorkerMessageListener,
  isOfflineReadyMessage,
  registerOfflineWorker
} from '../../src/renderer/utils/offline-registration';

class FakeContainer implements ServiceWorkerContainerLike {
  readonly listeners = new Set<WorkerMessageListener>();
  controller: unknown = null;
  register = jest.fn().mockResolvedValue({ scope: 'https://trainer.test/pwa/' });

  addEventListener(_type: 'message', listener: WorkerMessageListener): void {
    this.listeners.add(listener);
  }

  removeEventListener(_type: 'message', listener: WorkerMessageListener): void {
    this.listeners.delete(listener);
  }

  emit(data: unknown): void {
    this.listeners.forEach(listener => listener({ data }));
  }
}

describe('registerOfflineWorker', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should register the default worker script', async () => {
    const container = new FakeContainer();

    await registerOfflineWorker(container);

    expect(container.register).toHaveBeenCalledWith('./sw.js', undefined);
  });

  it('should pass a custom script and scope', async () => {
    const container = new FakeContainer();

    await registerOfflineWorker(container, { scriptUrl: '/pwa/sw.js', scope: '/pwa/' });

    expect(container.register).toHaveBeenCalledWith('/pwa/sw.js', { scope: '/pwa/' });
  });

  it('should call onOfflineReady only for the readiness broadcast', async () => {
    const container = new FakeContainer();
    const onOfflineReady = jest.fn();

    await registerOfflineWorker(container, { onOfflineReady });
    container.emit({ type: 'SOMETHING_ELSE' });
    container.emit('OFFLINE_READY');
    container.emit({ type: 'OFFLINE_READY' });

    expect(onOfflineReady).toHaveBeenCalledTimes(1);
  });

  it('should report a fresh install as not yet active', async () => {
    const container = new FakeContainer();

    const registration = await registerOfflineWorker(container);

    expect(registration?.alreadyActive).toBe(false);
  });

  it('should report an already active worker when the page is controlled', async () => {
    const container = new FakeContainer();
    container.controller = { scriptURL: 'https://trainer.test/pwa/sw.js' };

    const registration = await registerOfflineWorker(container);

    expect(registration?.alreadyActive).toBe(true);
  });

  it('should report an already active worker from the registration', async () => {
    const container = new FakeContainer();
    container.register.mockResolvedValueOnce({ scope: 'https://trainer.test/pwa/', active: { state: 'activated' } });

    const registration = await registerOfflineWorker(container);

    expect(registration?.alreadyActive).toBe(true);
  });

  it('should stop listening after unsubscribe', async () => {
    const container = new FakeContainer();
    const onOfflineReady = jest.fn();

    const registration = await registerOfflineWorker(container, { onOfflineReady });
    registration?.unsubscribe();
    container.emit({ type: 'OFFLINE_READY' });

    expect(container.listeners.size).toBe(0);
    expect(onOfflineReady).not.toHaveBeenCalled();
  });

  it('should resolve to null without service worker support', async () => {
    await expect(registerOfflineWorker(undefined)).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledWith('Service workers are not supported, offline mode is unavailable');
  });

  it('should remove its listener and rethrow when registration fails', async () => {
    const container = new FakeContainer();
    container.register.mockRejectedValueOnce(new Error('SecurityError'));

    await expect(registerOfflineWorker(container)).rejects.toThrow('SecurityError');
    expect(container.listeners.size).toBe(0);
  });
});

describe('isOfflineReadyMessage', () => {
  it.each([
    [{ type: 'OFFLINE_READY' }, true],
    [{ type: 'offline_ready' }, false],
    [null, false],
    [undefined, false],
    ['OFFLINE_READY', false]
  ])('recognises %p as %p', (data, expected) => {
    expect(isOfflineReadyMessage(data)).toBe(expected);
  });
});
