import { DispatchMessage } from '../models/contracts';

/**
 * Transport for job dispatch messages. Delivery is at-least-once: consumers
 * must tolerate the same message arriving more than once.
 */
export interface DispatchQueue {
  publish(message: DispatchMessage): void;
  take(): DispatchMessage | undefined;
  size(): number;
}

export class MemoryDispatchQueue implements DispatchQueue {
  private messages: DispatchMessage[] = [];

  publish(message: DispatchMessage): void {
    this.messages.push({ ...message });
  }

  take(): DispatchMessage | undefined {
    return this.messages.shift();
  }

  size(): number {
    return this.messages.length;
  }
}
