/**
 * One-slot yank/delete register.
 *
 * Holds the most recently yanked or deleted text. Whole-line content is
 * always newline-terminated. Paste reads the slot without clearing it.
 * Several engines may share one instance so that yanks cross editors.
 */
export class Register {
  private content = "";

  /**
   * Store text after a yank or delete.
   */
  set(text: string): void {
    this.content = text;
  }

  get(): string {
    return this.content;
  }
}
