// Stack frontier: the most recently pushed item is popped first.
export class LIFOQueue<T> {
  private a: T[] = [];
  constructor(items: Iterable<T> = []) {
    for (const v of items) this.a.push(v);
  }
  size() {
    return this.a.length;
  }
  push(v: T) {
    this.a.push(v);
  }
  pop(): T | undefined {
    return this.a.pop();
  }
}
