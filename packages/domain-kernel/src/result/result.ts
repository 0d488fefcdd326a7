type ResultState<T, E> = { ok: true; value: T } | { ok: false; error: E };

export class Result<T, E = string> {
  private constructor(private readonly state: ResultState<T, E>) {
    Object.freeze(this);
  }

  public get isSuccess(): boolean {
    return this.state.ok;
  }

  public get isFailure(): boolean {
    return !this.state.ok;
  }

  public getValue(): T {
    if (!this.state.ok) {
      throw new Error("Can't get the value of an error result. Use getError instead.");
    }
    return this.state.value;
  }

  public getError(): E {
    if (this.state.ok) {
      throw new Error("Can't get the error of a success result. Use getValue instead.");
    }
    return this.state.error;
  }

  public static ok<U>(value: U): Result<U, never> {
    return new Result<U, never>({ ok: true, value });
  }

  public static fail<U, E = string>(error: E): Result<U, E> {
    return new Result<U, E>({ ok: false, error });
  }
}
