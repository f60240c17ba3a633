import type { MessageWriter } from "../writer/message-writer.js";

/**
 * What a failed comparison hands to the writer. Results that need to show
 * their actual value in a special way, or add lines after it, do so through
 * the two callbacks.
 */
export interface ComparisonResult {
  readonly description: string;
  readonly actualValue: unknown;
  writeActualValueTo(writer: MessageWriter): void;
  writeAdditionalLinesTo(writer: MessageWriter): void;
}

export interface ComparisonResultInit {
  description: string;
  actualValue: unknown;
  writeActualValue?: (writer: MessageWriter, actualValue: unknown) => void;
  writeAdditionalLines?: (writer: MessageWriter) => void;
}

export function createComparisonResult(init: ComparisonResultInit): ComparisonResult {
  const { description, actualValue, writeActualValue, writeAdditionalLines } = init;

  return Object.freeze({
    description,
    actualValue,
    writeActualValueTo(writer: MessageWriter): void {
      if (writeActualValue) {
        writeActualValue(writer, actualValue);
      } else {
        writer.writeActualValue(actualValue);
      }
    },
    writeAdditionalLinesTo(writer: MessageWriter): void {
      writeAdditionalLines?.(writer);
    },
  });
}
