import { PipelineEvent } from '../../src/domain/events';
import { NotificationBus } from '../../src/notifications/bus';

async function take(stream: AsyncIterable<PipelineEvent>, count: number): Promise<PipelineEvent[]> {
  const out: PipelineEvent[] = [];
  for await (const event of stream) {
    out.push(event);
    if (out.length === count) break;
  }
  return out;
}

describe('NotificationBus', () => {
  it('sequences events globally and per job', () => {
    const bus = new NotificationBus();
    const a = bus.publish({ type: 'job.created', jobId: 'job_a', payload: {} });
    const b = bus.publish({ type: 'job.created', jobId: 'job_b', payload: {} });
    const c = bus.publish({ type: 'job.transitioned', jobId: 'job_a', payload: {} });
    const d = bus.publish({ type: 'config.changed', payload: { version: 2 } });

    expect([a.seq, b.seq, c.seq, d.seq]).toEqual([1, 2, 3, 4]);
    expect([a.jobSeq, b.jobSeq, c.jobSeq]).toEqual([1, 1, 2]);
    expect(d.jobSeq).toBeUndefined();
    expect(a.schemaVersion).toBe('1.0.0');
    expect(a.id).toMatch(/^evt_/);
    expect(bus.lastSeq).toBe(4);
  });

  it('delivers to a stream in publish order', async () => {
    const bus = new NotificationBus();
    const stream = bus.subscribe();
    bus.publish({ type: 'job.created', jobId: 'job_1', payload: {} });
    bus.publish({ type: 'job.transitioned', jobId: 'job_1', payload: { to: 'analyzing' } });

    const events = await take(stream, 2);
    expect(events.map((e) => e.type)).toEqual(['job.created', 'job.transitioned']);
    expect(bus.subscriberCount).toBe(0);
  });

  it('wakes a waiting consumer', async () => {
    const bus = new NotificationBus();
    const stream = bus.subscribe();
    const pending = stream.next();
    bus.publish({ type: 'label.generated', payload: { labelId: 'lbl_1' } });
    const result = await pending;
    expect(result.done).toBe(false);
    if (!result.done) expect(result.value.payload).toEqual({ labelId: 'lbl_1' });
  });

  it('filters by job and type', async () => {
    const bus = new NotificationBus();
    const stream = bus.subscribe({ jobId: 'job_1', types: ['job.failed'] });
    bus.publish({ type: 'job.failed', jobId: 'job_2', payload: {} });
    bus.publish({ type: 'job.created', jobId: 'job_1', payload: {} });
    bus.publish({ type: 'job.failed', jobId: 'job_1', payload: { stage: 'analysis' } });
    stream.close();

    const events = await take(stream, 10);
    expect(events).toHaveLength(1);
    expect(events[0]?.payload).toEqual({ stage: 'analysis' });
  });

  it('drops a subscriber that falls behind without blocking publish', () => {
    const bus = new NotificationBus();
    const slow = bus.subscribe({ maxQueue: 2 });
    for (let i = 0; i < 3; i++) bus.publish({ type: 'job.created', payload: { i } });

    expect(slow.dropped).toBe(true);
    expect(slow.isClosed).toBe(true);
    expect(slow.buffered).toBe(2);
    expect(bus.subscriberCount).toBe(0);
    expect(bus.lastSeq).toBe(3);
  });

  it('yields queued events after close, then ends', async () => {
    const bus = new NotificationBus();
    const stream = bus.subscribe();
    bus.publish({ type: 'job.created', payload: {} });
    stream.close();
    const events = await take(stream, 5);
    expect(events).toHaveLength(1);
  });

  it('isolates failing listeners', () => {
    const bus = new NotificationBus();
    const seen: string[] = [];
    bus.onEvent(() => {
      throw new Error('listener broke');
    });
    bus.onEvent((event) => seen.push(event.type), { types: ['label.deleted'] });

    bus.publish({ type: 'label.generated', payload: {} });
    bus.publish({ type: 'label.deleted', payload: {} });
    expect(seen).toEqual(['label.deleted']);
  });

  it('onEvent returns an unsubscribe', () => {
    const bus = new NotificationBus();
    const seen: number[] = [];
    const off = bus.onEvent((event) => seen.push(event.seq));
    bus.publish({ type: 'job.created', payload: {} });
    off();
    bus.publish({ type: 'job.created', payload: {} });
    expect(seen).toEqual([1]);
  });

  it('keeps a bounded history for recent()', () => {
    const bus = new NotificationBus({ historySize: 3 });
    for (let i = 0; i < 5; i++) bus.publish({ type: 'job.created', jobId: i % 2 === 0 ? 'even' : 'odd', payload: {} });

    expect(bus.recent(10).map((e) => e.seq)).toEqual([3, 4, 5]);
    expect(bus.recent(1).map((e) => e.seq)).toEqual([5]);
    expect(bus.recent(10, { jobId: 'even' }).map((e) => e.seq)).toEqual([3, 5]);
  });

  it('close() ends every stream', () => {
    const bus = new NotificationBus();
    const a = bus.subscribe();
    const b = bus.subscribe();
    bus.close();
    expect(a.isClosed && b.isClosed).toBe(true);
    expect(bus.subscriberCount).toBe(0);
  });
});
