/**
 * Collector for recoverable warnings raised while filtering
 */

export type WarningSink = (message: string) => void;

export class Diagnostics {
  private readonly messages: string[] = [];

  constructor(private readonly echo?: WarningSink) {}

  warn(message: string): void {
    this.messages.push(message);
    this.echo?.(message);
  }

  get warnings(): readonly string[] {
    return this.messages;
  }

  get count(): number {
    return this.messages.length;
  }
}
