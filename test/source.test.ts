import { AgentOutputStream, ClosedError } from '@icewrite/core';
import { ScriptedAgent } from './src/scriptedAgent.js';

describe('AgentOutputStream.createSource', () => {
  test('is not ready until the component reports writability', () => {
    const agent = new ScriptedAgent();
    const out = new AgentOutputStream(agent, 1, 1);
    const source = out.createSource();
    const onReady = vi.fn();
    source.on('ready', onReady);

    expect(source.isReady).toBe(false);
    agent.emitWritable(1, 2);
    expect(source.isReady).toBe(false);

    agent.emitWritable(1, 1);
    expect(source.isReady).toBe(true);
    expect(onReady).toHaveBeenCalledTimes(1);
  });

  test('rearm() waits for the next notification', async () => {
    const agent = new ScriptedAgent();
    const source = new AgentOutputStream(agent, 1, 1).createSource();

    agent.emitWritable();
    source.rearm();
    expect(source.isReady).toBe(false);

    const ready = source.whenReady();
    agent.emitWritable();
    await expect(ready).resolves.toBeUndefined();
  });

  test('a caller signal makes it ready and keeps it ready', () => {
    const agent = new ScriptedAgent();
    const controller = new AbortController();
    const source = new AgentOutputStream(agent, 1, 1).createSource(controller.signal);

    expect(source.isReady).toBe(false);
    controller.abort();
    expect(source.isReady).toBe(true);

    source.rearm();
    expect(source.isReady).toBe(true);
  });

  test('the component writable trigger fires once', () => {
    const agent = new ScriptedAgent();
    const trigger = new AbortController();
    agent.writableTrigger = trigger.signal;
    const source = new AgentOutputStream(agent, 1, 1).createSource();

    expect(source.isReady).toBe(false);
    trigger.abort();
    expect(source.isReady).toBe(true);

    source.rearm();
    expect(source.isReady).toBe(false);
  });

  test('is ready at once when the component is already writable', () => {
    const agent = new ScriptedAgent();
    agent.writableTrigger = AbortSignal.abort();
    const source = new AgentOutputStream(agent, 1, 1).createSource();

    expect(source.isReady).toBe(true);
  });

  test('tracks only the caller signal when the component is missing', () => {
    const agent = new ScriptedAgent();
    agent.hasComponent = false;
    const controller = new AbortController();
    const source = new AgentOutputStream(agent, 1, 1).createSource(controller.signal);

    expect(agent.listenerCount('reliable-transport-writable')).toBe(0);
    controller.abort();
    expect(source.isReady).toBe(true);
  });

  test('a closed stream yields a source that is ready and never signals', () => {
    const agent = new ScriptedAgent();
    const out = new AgentOutputStream(agent, 1, 1);
    out.close();

    const source = out.createSource(new AbortController().signal);
    const onReady = vi.fn();
    source.on('ready', onReady);

    expect(source.isReady).toBe(true);
    expect(agent.listenerCount('reliable-transport-writable')).toBe(0);
    agent.emitWritable();
    source.rearm();
    expect(source.isReady).toBe(true);
    expect(onReady).not.toHaveBeenCalled();
  });

  test('destroy() drops subscriptions and rejects pending waits', async () => {
    const agent = new ScriptedAgent();
    const source = new AgentOutputStream(agent, 1, 1).createSource();
    const ready = source.whenReady();

    expect(agent.listenerCount('reliable-transport-writable')).toBe(1);
    source.destroy();
    source.destroy();

    expect(source.isDestroyed).toBe(true);
    expect(agent.listenerCount('reliable-transport-writable')).toBe(0);
    await expect(ready).rejects.toBeInstanceOf(ClosedError);
    await expect(source.whenReady()).rejects.toThrow('Source was destroyed.');
  });
});
