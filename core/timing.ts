type Sleep = (ms: number) => Promise<void>;

const sleep: Sleep = (ms) =>
  new Promise((resolveSleep) => {
    setTimeout(resolveSleep, ms);
  });

const now = () => Date.now();

export { now, sleep };
export type { Sleep };
