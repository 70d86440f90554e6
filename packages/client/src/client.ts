import {
    createEnvelope,
    messageName,
    serializeEnvelope,
    setXmlType,
    unmarshalEnvelope,
    type Message,
} from "@soapwire/runtime";
import { readBody, releaseBody } from "./body.js";
import { decodeXml } from "./charset.js";
import { validateConfig, type ClientConfig } from "./config.js";
import {
    CONTENT_TYPE_HEADER,
    DEFAULT_CONTENT_TYPE,
    HTTP_STATUS_OK,
    MAX_ERROR_BODY_BYTES,
    SOAP_ACTION_HEADER,
    USER_AGENT_HEADER,
    soap12ContentType,
} from "./constants.js";
import {
    HTTPError,
    SoapDeserializationError,
    SoapSerializationError,
    SoapTransportError,
    errorMessage,
} from "./errors.js";
import { debug, debugContext } from "./logger.js";
import { AxiosTransport, type SoapHttpRequest, type SoapHttpResponse, type SoapTransport } from "./transport.js";

/**
 * Ejecuta una solicitud pasando `request` como Body del envelope SOAP y vuelca
 * la respuesta HTTP sobre `response`. Rechaza si falla la serialización,
 * la solicitud HTTP o la deserialización de la respuesta.
 */
export interface RoundTripper {
    roundTrip(request: Message | null | undefined, response: Message): Promise<void>;
    roundTripSoap12(action: string, request: Message | null | undefined, response: Message): Promise<void>;
}

type HeaderSetter = (httpRequest: SoapHttpRequest) => void;

// Transporte compartido por los clientes que no configuran uno propio
let defaultTransport: SoapTransport | null = null;

function resolveTransport(config: ClientConfig): SoapTransport {
    if (config.transport) {
        return config.transport;
    }
    if (!defaultTransport) {
        debug("Creando el transporte HTTP por defecto (axios)");
        defaultTransport = new AxiosTransport();
    }
    return defaultTransport;
}

function transportError(err: unknown, signal: AbortSignal | undefined): SoapTransportError {
    if (signal?.aborted) {
        return new SoapTransportError('La solicitud SOAP fue cancelada', { cause: err, canceled: true });
    }
    return new SoapTransportError(`Error de transporte en la solicitud SOAP: ${errorMessage(err)}`, { cause: err });
}

async function readResponseBody(httpResponse: SoapHttpResponse, signal: AbortSignal | undefined, limit?: number): Promise<Buffer> {
    try {
        return await readBody(httpResponse.body, { limit, signal });
    } catch (err) {
        throw transportError(err, signal);
    }
}

function statusLine(httpResponse: SoapHttpResponse): string {
    return `${httpResponse.status} ${httpResponse.statusText}`.trim();
}

/**
 * Algoritmo común a las tres variantes: anotar, armar el envelope, serializar,
 * enviar, clasificar el estado y deserializar.
 */
async function doRoundTrip(
    config: ClientConfig,
    setHeaders: HeaderSetter,
    request: Message | null | undefined,
    response: Message,
): Promise<void> {
    setXmlType(request);

    let payload: Buffer;
    try {
        const envelope = createEnvelope({
            endpoint: config.url,
            envelopeNamespace: config.envelope,
            namespace: config.namespace,
            thisNamespace: config.thisNamespace,
            urNamespace: config.urNamespace,
            xsiAttr: config.xsiAttr,
            usedNamespaces: config.usedNamespaces,
            header: config.header,
            body: request,
        });
        payload = Buffer.from(serializeEnvelope(envelope), 'utf-8');
    } catch (err) {
        throw new SoapSerializationError(`No se pudo serializar el envelope SOAP: ${errorMessage(err)}`, { cause: err });
    }

    const transport = resolveTransport(config);
    const httpRequest: SoapHttpRequest = {
        method: 'POST',
        url: config.url,
        headers: {},
        body: payload,
    };
    setHeaders(httpRequest);
    config.pre?.(httpRequest);
    if (config.signal) {
        httpRequest.signal = config.signal;
    }

    debugContext("roundTrip", `POST ${httpRequest.url} (${payload.length} bytes)`);

    let httpResponse: SoapHttpResponse;
    try {
        httpResponse = await transport.execute(httpRequest);
    } catch (err) {
        throw transportError(err, config.signal);
    }

    try {
        config.post?.(httpResponse);

        debugContext("roundTrip", `Respuesta ${statusLine(httpResponse)} de ${httpRequest.url}`);

        if (httpResponse.status !== HTTP_STATUS_OK) {
            const fragment = await readResponseBody(httpResponse, config.signal, MAX_ERROR_BODY_BYTES);
            throw new HTTPError(httpResponse.status, statusLine(httpResponse), fragment.toString('utf-8'));
        }

        const bytes = await readResponseBody(httpResponse, config.signal);
        debugContext("roundTrip", `Cuerpo de la respuesta: ${bytes.length} bytes`);
        try {
            unmarshalEnvelope(decodeXml(bytes), response);
        } catch (err) {
            throw new SoapDeserializationError(`No se pudo deserializar la respuesta SOAP: ${errorMessage(err)}`, { cause: err });
        }
    } finally {
        releaseBody(httpResponse.body);
    }
}

/**
 * Cliente SOAP
 */
export class SoapClient implements RoundTripper {
    constructor(readonly config: ClientConfig) {
        validateConfig(config);
    }

    /**
     * Valor de SOAPAction: `namespace/acción`, o solo la acción si excludeActionNamespace está activo
     */
    private actionName(action: string): string {
        return this.config.excludeActionNamespace ? action : `${this.config.namespace ?? ''}/${action}`;
    }

    private setUserAgent(httpRequest: SoapHttpRequest): void {
        if (this.config.userAgent) {
            httpRequest.headers[USER_AGENT_HEADER] = this.config.userAgent;
        }
    }

    private soap11Headers(action: string, request: Message | null | undefined): HeaderSetter {
        return (httpRequest) => {
            this.setUserAgent(httpRequest);
            httpRequest.headers[CONTENT_TYPE_HEADER] = this.config.contentType || DEFAULT_CONTENT_TYPE;
            if (request !== null && request !== undefined) {
                httpRequest.headers[SOAP_ACTION_HEADER] = this.actionName(action);
            }
        };
    }

    /**
     * SOAP 1.1: la SOAPAction se deriva del nombre del tipo de la solicitud
     */
    async roundTrip(request: Message | null | undefined, response: Message): Promise<void> {
        const action = messageName(request);
        debugContext("roundTrip", `SOAPAction derivada del tipo: "${action}"`);
        return doRoundTrip(this.config, this.soap11Headers(action, request), request, response);
    }

    /**
     * SOAP 1.1 con una SOAPAction explícita
     */
    async roundTripWithAction(soapAction: string, request: Message | null | undefined, response: Message): Promise<void> {
        return doRoundTrip(this.config, this.soap11Headers(soapAction, request), request, response);
    }

    /**
     * SOAP 1.2: la acción va como parámetro del Content-Type y no se envía SOAPAction
     */
    async roundTripSoap12(action: string, request: Message | null | undefined, response: Message): Promise<void> {
        const setHeaders: HeaderSetter = (httpRequest) => {
            this.setUserAgent(httpRequest);
            httpRequest.headers[CONTENT_TYPE_HEADER] = soap12ContentType(action);
        };
        return doRoundTrip(this.config, setHeaders, request, response);
    }
}

export function createClient(config: ClientConfig): SoapClient {
    return new SoapClient(config);
}
