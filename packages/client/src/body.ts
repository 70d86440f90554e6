import type { Readable } from "stream";

export interface ReadBodyOptions {
    limit?: number;
    signal?: AbortSignal;
}

function abortReason(signal: AbortSignal): Error {
    return signal.reason instanceof Error ? signal.reason : new Error('La operación fue cancelada');
}

/**
 * Libera el cuerpo de la respuesta si todavía no fue liberado
 */
export function releaseBody(body: Readable): void {
    if (!body.destroyed) {
        body.destroy();
    }
}

/**
 * Lee el cuerpo completo, o hasta `limit` bytes, y lo libera al terminar.
 * Si la señal se cancela durante la lectura, el stream se destruye y la lectura rechaza.
 */
export async function readBody(body: Readable, options: ReadBodyOptions = {}): Promise<Buffer> {
    const { limit = Infinity, signal } = options;
    const chunks: Buffer[] = [];
    let size = 0;

    const onAbort = (): void => {
        if (signal) body.destroy(abortReason(signal));
    };

    try {
        if (signal?.aborted) {
            throw abortReason(signal);
        }
        signal?.addEventListener('abort', onAbort, { once: true });
        for await (const chunk of body) {
            const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
            chunks.push(buffer);
            size += buffer.length;
            if (size >= limit) break;
        }
    } finally {
        signal?.removeEventListener('abort', onAbort);
        releaseBody(body);
    }

    const content = Buffer.concat(chunks);
    return content.length > limit ? content.subarray(0, limit) : content;
}
