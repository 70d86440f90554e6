export interface SoapErrorOptions {
    cause?: unknown;
}

/**
 * Error base de soapwire. Todas las fallas de una llamada se rechazan con una subclase.
 */
export class SoapError extends Error {
    constructor(message: string, options?: SoapErrorOptions) {
        super(message, options);
        this.name = 'SoapError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Configuración del cliente inválida (por ejemplo, URL vacía o mal formada)
 */
export class SoapConfigError extends SoapError {
    constructor(message: string, options?: SoapErrorOptions) {
        super(message, options);
        this.name = 'SoapConfigError';
    }
}

/**
 * La solicitud no se pudo serializar como XML
 */
export class SoapSerializationError extends SoapError {
    constructor(message: string, options?: SoapErrorOptions) {
        super(message, options);
        this.name = 'SoapSerializationError';
    }
}

export interface SoapTransportErrorOptions extends SoapErrorOptions {
    canceled?: boolean;
}

/**
 * El intercambio HTTP no se completó (DNS, conexión, timeout o cancelación)
 */
export class SoapTransportError extends SoapError {
    readonly canceled: boolean;

    constructor(message: string, options?: SoapTransportErrorOptions) {
        super(message, options);
        this.name = 'SoapTransportError';
        this.canceled = options?.canceled ?? false;
    }
}

/**
 * Respuesta HTTP distinta de 200 OK.
 * msg contiene como máximo el primer MiB del cuerpo de la respuesta.
 */
export class HTTPError extends SoapError {
    constructor(
        public readonly statusCode: number,
        public readonly status: string,
        public readonly msg: string,
    ) {
        super(`${JSON.stringify(status)}: ${JSON.stringify(msg)}`);
        this.name = 'HTTPError';
    }
}

/**
 * El cuerpo de la respuesta no se pudo parsear como envelope SOAP
 */
export class SoapDeserializationError extends SoapError {
    constructor(message: string, options?: SoapErrorOptions) {
        super(message, options);
        this.name = 'SoapDeserializationError';
    }
}

export function isHTTPError(error: unknown): error is HTTPError {
    return error instanceof HTTPError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
