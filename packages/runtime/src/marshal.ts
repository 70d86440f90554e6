import { localName } from "./soap.js";
import { ATTRIBUTE_PREFIX, XML_NAME_KEY, type Message, type XmlNode, type XmlValue } from "./types.js";

function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Devuelve el valor de la propiedad xmlName si es un string no vacío
 */
function explicitXmlName(value: object): string | undefined {
    const name: unknown = Reflect.get(value, XML_NAME_KEY);
    return typeof name === 'string' && name !== '' ? name : undefined;
}

/**
 * Nombre del tipo en tiempo de ejecución de un mensaje, usado para derivar la SOAPAction.
 *
 * Orden: nombre del constructor (si no es Object), nombre local de xmlName,
 * nombre local de la única clave raíz. Devuelve "" si no se puede determinar.
 */
export function messageName(message: Message | null | undefined): string {
    if (message === null || message === undefined) {
        return '';
    }
    if (!isPlainObject(message) && message.constructor.name && message.constructor.name !== 'Object') {
        return message.constructor.name;
    }
    const xmlName = explicitXmlName(message);
    if (xmlName) {
        return localName(xmlName);
    }
    const elementKeys = Object.keys(message).filter(key => !key.startsWith(ATTRIBUTE_PREFIX));
    return elementKeys.length === 1 ? localName(elementKeys[0]) : '';
}

/**
 * Convierte un valor arbitrario a la notación de fast-xml-parser.
 * Devuelve undefined para los valores que no producen nodo (undefined, null, funciones, símbolos).
 */
function toXmlValue(value: unknown, ancestors: Set<object>): XmlValue | undefined {
    switch (typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
            return value;
        case 'bigint':
            return value.toString();
        case 'object':
            break;
        default:
            return undefined;
    }
    if (value === null) {
        return undefined;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (ancestors.has(value)) {
        throw new TypeError('Referencia circular en el mensaje: no se puede serializar a XML');
    }
    ancestors.add(value);
    try {
        if (Array.isArray(value)) {
            const items: XmlValue[] = [];
            for (const item of value) {
                const converted = toXmlValue(item, ancestors);
                if (converted !== undefined) {
                    items.push(converted);
                }
            }
            return items;
        }
        return toXmlNode(value, ancestors);
    } finally {
        ancestors.delete(value);
    }
}

function toXmlNode(value: object, ancestors: Set<object>): XmlNode {
    const node: XmlNode = {};
    for (const key of Object.keys(value)) {
        if (key === XML_NAME_KEY) continue;
        const converted = toXmlValue(Reflect.get(value, key), ancestors);
        if (converted !== undefined) {
            node[key] = converted;
        }
    }
    return node;
}

/**
 * Serializa un mensaje a un nodo listo para XMLBuilder.
 *
 * Una instancia de clase (o cualquier objeto con xmlName) se envuelve en un elemento
 * con ese nombre; las claves de un objeto plano se emiten directamente.
 */
export function marshalMessage(message: Message): XmlNode {
    const ancestors = new Set<object>([message]);
    const content = toXmlNode(message, ancestors);
    const elementName = explicitXmlName(message) ?? (isPlainObject(message) ? undefined : message.constructor.name);
    return elementName ? { [elementName]: content } : content;
}
