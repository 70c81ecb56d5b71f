/**
 * DATA content encoding.
 */

/**
 * Streaming encoder for DATA content.
 *
 * Converts bare LF to CRLF and doubles leading dots, keeping line state across
 * chunks so a message may be written in several pieces.
 */
export class DotEncoder {
  private atLineStart = true;
  private pendingCr = false;

  /**
   * Encodes one chunk of message content.
   */
  encode(chunk: string): string {
    let out = '';

    for (const ch of chunk) {
      if (this.pendingCr) {
        this.pendingCr = false;
        if (ch === '\n') {
          out += '\r\n';
          this.atLineStart = true;
          continue;
        }
        out += '\r';
        this.atLineStart = false;
      }

      if (ch === '\r') {
        this.pendingCr = true;
        continue;
      }

      if (ch === '\n') {
        out += '\r\n';
        this.atLineStart = true;
        continue;
      }

      if (this.atLineStart && ch === '.') {
        out += '.';
      }
      out += ch;
      this.atLineStart = false;
    }

    return out;
  }

  /**
   * Returns the terminating sequence, completing an unterminated last line.
   */
  finish(): string {
    let out = '';
    if (this.pendingCr) {
      this.pendingCr = false;
      out += '\r\n';
      this.atLineStart = true;
    }
    if (!this.atLineStart) {
      out += '\r\n';
    }
    this.atLineStart = true;
    return out + '.\r\n';
  }
}

/**
 * Prepares a complete message for SMTP transmission.
 */
export function prepareMessageData(content: string): string {
  const encoder = new DotEncoder();
  return encoder.encode(content) + encoder.finish();
}
