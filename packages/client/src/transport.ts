import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { Readable } from "stream";

/**
 * Solicitud HTTP ya armada por el motor; el hook pre puede modificarla
 */
export interface SoapHttpRequest {
    method: 'POST';
    url: string;
    headers: Record<string, string>;
    body: Buffer;
    signal?: AbortSignal;
}

/**
 * Respuesta HTTP. El cuerpo se entrega como stream: el motor lo lee una sola vez
 * y lo libera antes de terminar la llamada.
 */
export interface SoapHttpResponse {
    status: number;
    statusText: string;
    headers: Record<string, string>;
    body: Readable;
}

/**
 * Ejecuta una solicitud y devuelve la respuesta, o rechaza si el intercambio no se completa.
 * Un estado HTTP de error no es una falla de transporte.
 */
export interface SoapTransport {
    execute(request: SoapHttpRequest): Promise<SoapHttpResponse>;
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
    const flat: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        if (value === undefined || value === null) continue;
        flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }
    return flat;
}

/**
 * Transporte por defecto sobre axios
 */
export class AxiosTransport implements SoapTransport {
    constructor(private readonly http: AxiosInstance = axios.create()) {}

    async execute(request: SoapHttpRequest): Promise<SoapHttpResponse> {
        const response = await this.http.request<Readable>({
            method: request.method,
            url: request.url,
            headers: request.headers,
            data: request.body,
            signal: request.signal,
            responseType: 'stream',
            // El motor clasifica los estados; axios no debe rechazar ninguno
            validateStatus: () => true,
        });
        return {
            status: response.status,
            statusText: response.statusText,
            headers: flattenHeaders(response.headers),
            body: response.data,
        };
    }
}
