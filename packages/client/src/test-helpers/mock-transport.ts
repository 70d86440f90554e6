import { Readable } from "stream";
import type { SoapHttpRequest, SoapHttpResponse, SoapTransport } from "../transport.js";

export interface MockResponse {
    status: number;
    statusText: string;
    body: string | Buffer;
    headers?: Record<string, string>;
}

/**
 * Transporte en proceso para tests: registra las solicitudes y devuelve respuestas preparadas
 */
export class MockTransport implements SoapTransport {
    readonly requests: SoapHttpRequest[] = [];
    readonly bodies: Readable[] = [];
    private nextResponse: MockResponse = { status: 200, statusText: 'OK', body: '' };
    private failure: Error | null = null;

    setMockResponse(status: number, statusText: string, body: string | Buffer, headers: Record<string, string> = {}): void {
        this.nextResponse = { status, statusText, body, headers };
        this.failure = null;
    }

    setFailure(error: Error): void {
        this.failure = error;
    }

    get lastRequest(): SoapHttpRequest | undefined {
        return this.requests[this.requests.length - 1];
    }

    async execute(request: SoapHttpRequest): Promise<SoapHttpResponse> {
        this.requests.push(request);
        if (this.failure) {
            throw this.failure;
        }
        const body = Readable.from([Buffer.isBuffer(this.nextResponse.body) ? this.nextResponse.body : Buffer.from(this.nextResponse.body, 'utf-8')]);
        this.bodies.push(body);
        return {
            status: this.nextResponse.status,
            statusText: this.nextResponse.statusText,
            headers: { 'content-type': 'text/xml', ...this.nextResponse.headers },
            body,
        };
    }
}

export function soapResponse(body: string, prefix = 'soap'): string {
    return `<?xml version="1.0" encoding="UTF-8"?>`
        + `<${prefix}:Envelope xmlns:${prefix}="http://schemas.xmlsoap.org/soap/envelope/">`
        + `<${prefix}:Body>${body}</${prefix}:Body>`
        + `</${prefix}:Envelope>`;
}
