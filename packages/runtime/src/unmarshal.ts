import { XMLParser, XMLValidator } from "fast-xml-parser";
import { localName } from "./soap.js";
import { ATTRIBUTE_PREFIX, TEXT_NODE_NAME, isXmlNode, type Message, type XmlValue } from "./types.js";

// El texto de las hojas queda como string: el tipo lo decide el llamador
const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_NODE_NAME,
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
});

/**
 * Contenido de un envelope de respuesta; body es undefined si el envelope no trae Body
 */
export interface ParsedEnvelope {
    header?: XmlValue;
    body?: XmlValue;
}

/**
 * Valida y parsea un documento SOAP de respuesta.
 * Los prefijos de namespace se eliminan, por lo que Envelope/Body se reconocen
 * por su nombre local sin importar el prefijo usado por el servidor.
 */
export function parseEnvelope(xml: string): ParsedEnvelope {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        const { msg, line, col } = validation.err;
        throw new Error(`XML inválido en la línea ${line}, columna ${col}: ${msg}`);
    }

    const document: unknown = parser.parse(xml);
    if (!isXmlNode(document)) {
        throw new Error('El documento XML no tiene elemento raíz');
    }
    // Omitir declaraciones <?xml ...?> e instrucciones de procesamiento
    const rootName = Object.keys(document).find(key => !key.startsWith('?'));
    if (rootName === undefined) {
        throw new Error('El documento XML no tiene elemento raíz');
    }
    if (localName(rootName) !== 'Envelope') {
        throw new Error(`Se esperaba el elemento <Envelope> pero se encontró <${rootName}>`);
    }

    const envelope = document[rootName];
    if (!isXmlNode(envelope)) {
        return {};
    }
    return { header: envelope['Header'], body: envelope['Body'] };
}

/**
 * Asigna los hijos del Body sobre el objeto de respuesta del llamador.
 * Un Body vacío o ausente deja el objeto sin cambios.
 */
export function bindBody(response: Message, body: XmlValue | undefined): void {
    if (isXmlNode(body)) {
        Object.assign(response, body);
    }
}

/**
 * Parsea la respuesta y vuelca su Body en el objeto de respuesta
 */
export function unmarshalEnvelope(xml: string, response: Message): void {
    const { body } = parseEnvelope(xml);
    bindBody(response, body);
}
