export const DEFAULT_CONTENT_TYPE = 'text/xml';

// Único estado que se considera éxito; cualquier otro (incluido 201) es un HTTPError
export const HTTP_STATUS_OK = 200;

// En el camino de error solo se lee el primer MiB del cuerpo
export const MAX_ERROR_BODY_BYTES = 1024 * 1024;

export const USER_AGENT_HEADER = 'User-Agent';
export const CONTENT_TYPE_HEADER = 'Content-Type';
export const SOAP_ACTION_HEADER = 'SOAPAction';

/**
 * Content-Type de SOAP 1.2: la acción viaja como parámetro y no hay header SOAPAction
 */
export function soap12ContentType(action: string): string {
    return `application/soap+xml; charset=utf-8; action="${action}"`;
}
