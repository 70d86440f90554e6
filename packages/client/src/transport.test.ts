import { describe, it, expect } from "vitest";
import axios, { type InternalAxiosRequestConfig } from "axios";
import { Readable } from "stream";
import { AxiosTransport } from "./transport.js";

describe('AxiosTransport', () => {
    function transportWith(status: number, statusText: string, seen: InternalAxiosRequestConfig[]): AxiosTransport {
        const http = axios.create({
            adapter: async (config) => {
                seen.push(config);
                return {
                    data: Readable.from([Buffer.from('<fault/>')]),
                    status,
                    statusText,
                    headers: { 'Content-Type': 'text/xml' },
                    config,
                };
            },
        });
        return new AxiosTransport(http);
    }

    it('envía el POST con el cuerpo y los headers de la solicitud', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const transport = transportWith(200, 'OK', seen);
        const body = Buffer.from('<soapenv:Envelope/>');

        await transport.execute({
            method: 'POST',
            url: 'http://svc.test/users',
            headers: { 'Content-Type': 'text/xml', SOAPAction: 'urn:Ping' },
            body,
        });

        expect(seen).toHaveLength(1);
        expect(seen[0]?.method).toBe('post');
        expect(seen[0]?.url).toBe('http://svc.test/users');
        expect(seen[0]?.data).toBe(body);
        expect(seen[0]?.responseType).toBe('stream');
        expect(seen[0]?.headers.get('SOAPAction')).toBe('urn:Ping');
    });

    it('devuelve los estados de error sin rechazar y normaliza los headers', async () => {
        const transport = transportWith(500, 'Internal Server Error', []);

        const response = await transport.execute({ method: 'POST', url: 'http://svc.test/users', headers: {}, body: Buffer.alloc(0) });

        expect(response.status).toBe(500);
        expect(response.statusText).toBe('Internal Server Error');
        expect(response.headers['content-type']).toBe('text/xml');
        expect(response.body).toBeInstanceOf(Readable);
    });

    it('acepta cualquier estado en validateStatus', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        await transportWith(404, 'Not Found', seen)
            .execute({ method: 'POST', url: 'http://svc.test/users', headers: {}, body: Buffer.alloc(0) });

        expect(seen[0]?.validateStatus?.(404)).toBe(true);
        expect(seen[0]?.validateStatus?.(503)).toBe(true);
    });
});
