import { createReadStream } from "node:fs";
import { z } from "zod";
import { IoError, ParseError } from "./errors.js";
import type { Operation } from "./types.js";

const OperationSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("Inserted"), id: z.string(), string: z.string() }),
  z.object({ op: z.literal("Changed"), id: z.string(), string: z.string() }),
  z.object({ op: z.literal("Deleted"), id: z.string() }),
  z.object({ op: z.literal("Error"), message: z.string() }),
]);

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Yields raw lines (without terminator) from the start of the file.
 * A trailing newline does not produce an extra empty line.
 */
async function* readLines(filePath: string): AsyncGenerator<Buffer> {
  const stream = createReadStream(filePath);
  let pending: Buffer = Buffer.alloc(0);

  try {
    for await (const data of stream) {
      const chunk = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
      pending = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;

      let start = 0;
      let newline = pending.indexOf(NEWLINE, start);
      while (newline !== -1) {
        yield stripCarriageReturn(pending.subarray(start, newline));
        start = newline + 1;
        newline = pending.indexOf(NEWLINE, start);
      }
      pending = pending.subarray(start);
    }
  } catch (error) {
    throw new IoError("read", filePath, error);
  } finally {
    stream.destroy();
  }

  if (pending.length > 0) {
    yield stripCarriageReturn(pending);
  }
}

function stripCarriageReturn(line: Buffer): Buffer {
  return line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN
    ? line.subarray(0, line.length - 1)
    : line;
}

export function parseOperation(raw: Buffer, lineNumber: number): Operation {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(raw);
  } catch (error) {
    throw new ParseError(lineNumber, "invalid UTF-8", error);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(lineNumber, reason, error);
  }

  const parsed = OperationSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
      .join("; ");
    throw new ParseError(lineNumber, reason, parsed.error);
  }
  return parsed.data;
}

/** Reads every operation from offset zero. Stops at the first malformed line. */
export async function* readOperations(filePath: string): AsyncGenerator<Operation> {
  let lineNumber = 0;
  for await (const raw of readLines(filePath)) {
    lineNumber++;
    yield parseOperation(raw, lineNumber);
  }
}

export function operationText(operation: Operation): string | undefined {
  switch (operation.op) {
    case "Inserted":
    case "Changed":
      return operation.string;
    case "Deleted":
    case "Error":
      return undefined;
  }
}

export async function* readTextItems(filePath: string): AsyncGenerator<string> {
  for await (const operation of readOperations(filePath)) {
    const text = operationText(operation);
    if (text !== undefined) yield text;
  }
}

/** Drops the first `count` items. Resumption skips by item count, not line count. */
export async function* skipItems<T>(
  items: AsyncIterable<T>,
  count: number,
): AsyncGenerator<T> {
  let skipped = 0;
  for await (const item of items) {
    if (skipped < count) {
      skipped++;
      continue;
    }
    yield item;
  }
}
