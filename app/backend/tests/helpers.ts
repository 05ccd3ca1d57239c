import { animationDurations } from '../src/session/animations';
import type { MachineContext } from '../src/session/sessionMachine';
import { CompositeStrip, Photograph, RemoteConfig, createPhotograph } from '../src/types';

export const solidPhoto = (
  width: number,
  height: number,
  [r, g, b]: [number, number, number] = [200, 40, 40]
): Photograph => {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
    data[i + 3] = 255;
  }
  return createPhotograph(width, height, data);
};

export const fakeStrip = (): CompositeStrip => ({ ...solidPhoto(3, 8), kind: 'strip' });

export const REMOTE: RemoteConfig = {
  id: 'booth-1',
  name: 'Test booth',
  teams: [
    { id: 'team-alpha', name: 'Alpha', checkedIn: true },
    { id: 'team-beta', name: 'Beta', checkedIn: false },
  ],
};

export class FakeClock {
  constructor(public value = 0) {}

  now = () => this.value;

  set(value: number) {
    this.value = value;
  }
}

export const machineContext = (clock: FakeClock): MachineContext => ({
  now: clock.now,
  durations: animationDurations(),
  shotCount: 4,
  linkFor: (handle) => `https://booth.test/takes/${handle.takeId}`,
});

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
