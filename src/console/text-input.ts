/**
 * Headless text input host.
 *
 * Feeds keystrokes from the host's own key handling into whichever edit line
 * is currently capturing. Only one capture session exists at a time.
 */

import type { TextInputHost, TextInputSession, TextInputTarget } from './types.js';
import { codePointLength, utf8ByteLength } from './text-utils.js';

class CaptureSession implements TextInputSession {
  selectionStart: number;

  constructor(
    readonly target: TextInputTarget,
    readonly capacity: number,
  ) {
    this.selectionStart = target.caretOffset;
  }

  get size(): number {
    return utf8ByteLength(this.target.content);
  }

  get length(): number {
    return codePointLength(this.target.content);
  }
}

export class KeyboardTextInput implements TextInputHost {
  private session: CaptureSession | null = null;

  startCapture(target: TextInputTarget, capacity: number): TextInputSession {
    this.session = new CaptureSession(target, capacity);
    return this.session;
  }

  stopCapture(): void {
    this.session = null;
  }

  get active(): boolean {
    return this.session !== null;
  }

  /** Returns false when nothing is capturing. */
  type(text: string): boolean {
    const session = this.session;
    if (!session) return false;
    session.target.insert(text);
    session.selectionStart = session.target.caretOffset;
    return true;
  }

  backspace(): boolean {
    const session = this.session;
    if (!session) return false;
    session.target.deleteBackward();
    session.selectionStart = session.target.caretOffset;
    return true;
  }

  moveCaret(offset: number): boolean {
    const session = this.session;
    if (!session) return false;
    session.target.moveCaretTo(offset);
    session.selectionStart = session.target.caretOffset;
    return true;
  }
}
