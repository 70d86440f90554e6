export const SOAP11_ENVELOPE_URI = 'http://schemas.xmlsoap.org/soap/envelope/';
export const SOAP12_ENVELOPE_URI = 'http://www.w3.org/2003/05/soap-envelope';

// Namespace de instancias de XML Schema (atributos xsi:type, xsi:nil)
export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

export const SOAP_TAGS = ["Envelope", "Header", "Body"] as const;

export type SoapTag = typeof SOAP_TAGS[number];

// El elemento raíz siempre se emite como soapenv:Envelope, sin importar el resto de namespaces
export const soapenv = {
    Envelope: "soapenv:Envelope",
    Header: "soapenv:Header",
    Body: "soapenv:Body",
} as const satisfies Record<SoapTag, string>;

/**
 * Extrae el nombre local de un nombre calificado ("tns:GetUser" -> "GetUser")
 */
export function localName(qualifiedName: string): string {
    const separator = qualifiedName.lastIndexOf(':');
    return separator === -1 ? qualifiedName : qualifiedName.slice(separator + 1);
}
