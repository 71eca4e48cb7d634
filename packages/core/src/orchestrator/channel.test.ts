import { OutcomeChannel } from './channel';

async function drain<T>(channel: OutcomeChannel<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of channel) {
    values.push(value);
  }
  return values;
}

describe('OutcomeChannel', () => {
  it('yields buffered values then ends on close', async () => {
    const channel = new OutcomeChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2]);
  });

  it('wakes a waiting consumer', async () => {
    const channel = new OutcomeChannel<string>();
    const drained = drain(channel);

    await Promise.resolve();
    channel.push('a');
    await Promise.resolve();
    channel.push('b');
    channel.close();

    expect(await drained).toEqual(['a', 'b']);
  });

  it('rethrows a failure in the consumer', async () => {
    const channel = new OutcomeChannel<number>();
    const drained = drain(channel);
    channel.push(1);
    channel.fail(new Error('boom'));

    await expect(drained).rejects.toThrow('boom');
  });

  it('rejects pushes after close', () => {
    const channel = new OutcomeChannel<number>();
    channel.close();

    expect(() => channel.push(1)).toThrow('Cannot push to a closed channel');
  });

  it('allows a single consumer', () => {
    const channel = new OutcomeChannel<number>();
    channel[Symbol.asyncIterator]();

    expect(() => channel[Symbol.asyncIterator]()).toThrow('Channel already has a consumer');
  });
});
