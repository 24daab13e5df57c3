import { Style } from './Style.js';

/**
 * Stack of cumulatively combined styles for nested application.
 * The base entry is never popped.
 */
export class StyleStack {
  private readonly stack: Style[];

  constructor(base: Style = Style.null()) {
    this.stack = [base];
  }

  get current(): Style {
    return this.stack[this.stack.length - 1];
  }

  /** Push `style` combined onto the current style. */
  push(style: Style): void {
    this.stack.push(this.current.combine(style));
  }

  /** Pop the most recent style and return the new current style. */
  pop(): Style {
    if (this.stack.length > 1) {
      this.stack.pop();
    }
    return this.current;
  }

  get length(): number {
    return this.stack.length;
  }

  /** True when only the base style remains. */
  get isEmpty(): boolean {
    return this.stack.length <= 1;
  }
}
