import { UnreadableDocumentError } from "../../utils/PipelineError";
import type { DocumentSource } from "../../types/document.types";

function isReadableStream(source: DocumentSource): source is ReadableStream<Uint8Array> {
    return "getReader" in source;
}

async function* iterateStream(stream: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
    const reader = stream.getReader();
    let drained = false;
    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) {
                drained = true;
                return;
            }
            yield value;
        }
    } finally {
        // A consumer that stops early leaves the rest of the body unread
        if (drained) reader.releaseLock();
        else await reader.cancel();
    }
}

export function assertWithinUploadLimit(size: number, fileName: string, maxBytes: number): void {
    if (size > maxBytes) {
        throw new UnreadableDocumentError(
            fileName,
            `File exceeds the ${(maxBytes / 1024 / 1024).toFixed(0)} MB upload limit`
        );
    }
}

/**
 * Drains a document source into one buffer, failing as soon as it grows past
 * `maxBytes`.
 */
export async function readDocumentBytes(
    source: DocumentSource,
    fileName: string,
    maxBytes: number
): Promise<Uint8Array> {
    const parts: Uint8Array[] = [];
    let total = 0;

    const iterable = isReadableStream(source) ? iterateStream(source) : source;
    for await (const part of iterable) {
        total += part.length;
        assertWithinUploadLimit(total, fileName, maxBytes);
        parts.push(part);
    }

    if (total === 0) {
        throw new UnreadableDocumentError(fileName, "File is empty");
    }

    const bytes = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
        bytes.set(part, offset);
        offset += part.length;
    }
    return bytes;
}
