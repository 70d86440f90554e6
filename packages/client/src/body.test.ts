import { describe, it, expect } from "vitest";
import { Readable } from "stream";
import { readBody, releaseBody } from "./body.js";

describe('readBody', () => {
    it('lee el cuerpo completo y libera el stream', async () => {
        const body = Readable.from([Buffer.from('<a>'), Buffer.from('</a>')]);

        const content = await readBody(body);

        expect(content.toString('utf-8')).toBe('<a></a>');
        expect(body.destroyed).toBe(true);
    });

    it('se detiene en el límite indicado', async () => {
        const body = Readable.from([Buffer.from('abcd'), Buffer.from('efgh'), Buffer.from('ijkl')]);

        const content = await readBody(body, { limit: 6 });

        expect(content.toString('utf-8')).toBe('abcdef');
        expect(body.destroyed).toBe(true);
    });

    it('acepta chunks de texto', async () => {
        const content = await readBody(Readable.from(['ho', 'la']));

        expect(content.toString('utf-8')).toBe('hola');
    });

    it('rechaza sin leer si la señal ya estaba abortada', async () => {
        const controller = new AbortController();
        controller.abort(new Error('deadline'));
        const body = Readable.from([Buffer.from('x')]);

        await expect(readBody(body, { signal: controller.signal })).rejects.toThrow('deadline');
        expect(body.destroyed).toBe(true);
    });

    it('rechaza cuando la señal se aborta durante la lectura', async () => {
        const controller = new AbortController();
        const body = new Readable({ read() {} });
        body.push('parcial');

        const reading = readBody(body, { signal: controller.signal });
        setTimeout(() => controller.abort(new Error('cancelado')), 5);

        await expect(reading).rejects.toThrow('cancelado');
        expect(body.destroyed).toBe(true);
    });
});

describe('releaseBody', () => {
    it('destruye el stream una sola vez', () => {
        const body = Readable.from(['x']);
        let closes = 0;
        body.on('close', () => closes++);

        releaseBody(body);
        releaseBody(body);

        expect(body.destroyed).toBe(true);
        return new Promise<void>(resolve => setImmediate(() => {
            expect(closes).toBe(1);
            resolve();
        }));
    });
});
