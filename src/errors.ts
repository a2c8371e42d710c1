export class EmptyListError extends Error {
  constructor(public readonly operation: string) {
    super(`${operation} of empty list`);
    this.name = "EmptyListError";
  }
}

export class IndexOutOfRangeError extends Error {
  constructor(public readonly index: number, public readonly length: number) {
    super(`index ${index} out of range for length ${length}`);
    this.name = "IndexOutOfRangeError";
  }
}
