import type { XmlNode } from "./types.js";

export interface AuthHeaderOptions {
    namespace: string;
    username: string;
    password: string;
}

/**
 * Contenido del Header SOAP con credenciales; las credenciales quedan como hijos
 * directos de soapenv:Header:
 * <soapenv:Header xmlns:ns="..."><ns:username/><ns:password/></soapenv:Header>
 */
export function authHeader({ namespace, username, password }: AuthHeaderOptions): XmlNode {
    return {
        '@_xmlns:ns': namespace,
        'ns:username': username,
        'ns:password': password,
    };
}
