/**
 * Carga útil opaca de un mensaje SOAP (cuerpo de solicitud, cuerpo de respuesta o header).
 * El motor solo la inspecciona a través del anotador de tipos.
 */
export type Message = object;

export type XmlScalar = string | number | boolean;

export type XmlValue = XmlScalar | XmlNode | XmlValue[];

/**
 * Nodo en la notación de objetos de fast-xml-parser:
 * claves = elementos, claves con prefijo "@_" = atributos, "#text" = texto
 */
export interface XmlNode {
    [key: string]: XmlValue;
}

export const ATTRIBUTE_PREFIX = "@_";
export const TEXT_NODE_NAME = "#text";

// Propiedad equivalente a XMLName: nombre del elemento que envuelve a una instancia
export const XML_NAME_KEY = "xmlName";

export function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
