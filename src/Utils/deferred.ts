export class Deferred<T> implements PromiseLike<T> {
  readonly promise: Promise<T>;
  private settled = false;
  private resolveFn: (value: T) => void = () => {};
  private rejectFn: (reason: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
  }

  get isSettled() {
    return this.settled;
  }

  resolve(value: T) {
    if (this.settled) return;
    this.settled = true;
    this.resolveFn(value);
  }

  reject(reason: unknown) {
    if (this.settled) return;
    this.settled = true;
    this.rejectFn(reason);
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }
}
