import type { Message } from "@soapwire/runtime";
import { SoapConfigError } from "./errors.js";
import type { SoapHttpRequest, SoapHttpResponse, SoapTransport } from "./transport.js";

/**
 * Configuración de un cliente SOAP.
 * Se trata como de solo lectura durante una llamada y puede compartirse entre llamadas concurrentes,
 * siempre que el transporte y los hooks también lo permitan.
 */
export interface ClientConfig {
    url: string;                        // URL del servidor
    userAgent?: string;                 // header User-Agent de cada solicitud
    namespace?: string;                 // namespace SOAP; también prefija la SOAPAction
    urNamespace?: string;               // xmlns:urn
    thisNamespace?: string;             // xmlns:tns
    xsiAttr?: string;                   // xmlns:xsi
    excludeActionNamespace?: boolean;   // SOAPAction sin el namespace
    envelope?: string;                  // xmlns:soapenv (SOAP 1.1 por defecto)
    header?: Message;                   // se adjunta tal cual como soapenv:Header
    contentType?: string;               // text/xml por defecto
    transport?: SoapTransport;          // axios por defecto
    pre?: (request: SoapHttpRequest) => void;    // modifica la solicitud saliente
    post?: (response: SoapHttpResponse) => void; // observa la respuesta antes de leer el cuerpo
    signal?: AbortSignal;               // cancelación / deadline
    usedNamespaces?: Readonly<Record<string, string>>; // "tns0".."tns14" -> URI
}

/**
 * Verifica que la configuración tenga una URL absoluta válida
 */
export function validateConfig(config: ClientConfig): void {
    if (typeof config.url !== 'string' || config.url.trim() === '') {
        throw new SoapConfigError('La configuración del cliente requiere una URL no vacía');
    }
    try {
        new URL(config.url);
    } catch (err) {
        throw new SoapConfigError(`URL inválida: ${config.url}`, { cause: err });
    }
}
