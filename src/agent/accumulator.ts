import type { ToolCall } from '../types.js';
import type { ToolCallDelta } from '../providers/base.js';

interface PartialToolCall {
  id: string;
  functionName: string;
  argumentsJson: string;
}

function emptySlot(): PartialToolCall {
  return { id: '', functionName: '', argumentsJson: '' };
}

/**
 * Reassembles streamed tool-call fragments. Slots are addressed by the
 * delta's index and grow on demand; names and arguments are appended as
 * they arrive, since a single JSON token can be split across deltas.
 */
export class ToolCallAccumulator {
  private slots: PartialToolCall[] = [];

  add(delta: ToolCallDelta): void {
    if (!Number.isInteger(delta.index) || delta.index < 0) {
      return;
    }
    while (this.slots.length <= delta.index) {
      this.slots.push(emptySlot());
    }
    const slot = this.slots[delta.index];
    if (delta.id) slot.id = delta.id;
    if (delta.name) slot.functionName += delta.name;
    if (delta.arguments) slot.argumentsJson += delta.arguments;
  }

  get slotCount(): number {
    return this.slots.length;
  }

  /**
   * Completed calls in slot order. Slots that never got a function name are
   * dropped; missing ids become `call_<index>_<now>`.
   */
  finalize(now: number = Date.now()): ToolCall[] {
    const calls: ToolCall[] = [];
    this.slots.forEach((slot, index) => {
      if (!slot.functionName) return;
      calls.push(
        Object.freeze({
          id: slot.id || `call_${index}_${now}`,
          functionName: slot.functionName,
          argumentsJson: slot.argumentsJson,
        }),
      );
    });
    return calls;
  }

  reset(): void {
    this.slots = [];
  }
}
