import { XMLBuilder } from "fast-xml-parser";
import { marshalMessage } from "./marshal.js";
import { namespaceSlotsFrom, type NamespaceSlotEntry } from "./namespaces.js";
import { SOAP11_ENVELOPE_URI, soapenv } from "./soap.js";
import { ATTRIBUTE_PREFIX, TEXT_NODE_NAME, type Message, type XmlNode } from "./types.js";

/**
 * Envelope SOAP de una solicitud.
 * Los atributos opcionales vacíos o ausentes no se emiten.
 */
export interface Envelope {
    envelopeAttr: string;            // xmlns:soapenv
    nsAttr: string;                  // xmlns (namespace por defecto)
    tnsAttr?: string;                // xmlns:tns
    urnAttr?: string;                // xmlns:urn
    xsiAttr?: string;                // xmlns:xsi
    namespaceSlots: readonly NamespaceSlotEntry[]; // xmlns:tns0 .. xmlns:tns14
    header?: Message;
    body?: Message;
}

export interface EnvelopeOptions {
    endpoint: string;
    envelopeNamespace?: string;
    namespace?: string;
    thisNamespace?: string;
    urNamespace?: string;
    xsiAttr?: string;
    usedNamespaces?: Readonly<Record<string, string>>;
    header?: Message | null;
    body?: Message | null;
}

/**
 * Construye el envelope de una solicitud.
 * xmlns:soapenv toma por defecto el namespace de SOAP 1.1 y xmlns la URL del endpoint.
 */
export function createEnvelope(options: EnvelopeOptions): Envelope {
    return {
        envelopeAttr: options.envelopeNamespace || SOAP11_ENVELOPE_URI,
        nsAttr: options.namespace || options.endpoint,
        tnsAttr: options.thisNamespace,
        urnAttr: options.urNamespace,
        xsiAttr: options.xsiAttr,
        namespaceSlots: namespaceSlotsFrom(options.usedNamespaces),
        header: options.header ?? undefined,
        body: options.body ?? undefined,
    };
}

function setAttribute(node: XmlNode, name: string, value: string | undefined): void {
    if (value) {
        node[ATTRIBUTE_PREFIX + name] = value;
    }
}

/**
 * Representa el envelope en la notación de objetos de fast-xml-parser
 */
export function toXmlDocument(envelope: Envelope): XmlNode {
    const root: XmlNode = {};
    root[ATTRIBUTE_PREFIX + 'xmlns:soapenv'] = envelope.envelopeAttr;
    root[ATTRIBUTE_PREFIX + 'xmlns'] = envelope.nsAttr;
    setAttribute(root, 'xmlns:tns', envelope.tnsAttr);
    setAttribute(root, 'xmlns:urn', envelope.urnAttr);
    setAttribute(root, 'xmlns:xsi', envelope.xsiAttr);
    for (const [slot, uri] of envelope.namespaceSlots) {
        setAttribute(root, `xmlns:${slot}`, uri);
    }
    if (envelope.header !== undefined) {
        root[soapenv.Header] = marshalMessage(envelope.header);
    }
    if (envelope.body !== undefined) {
        root[soapenv.Body] = marshalMessage(envelope.body);
    }
    return { [soapenv.Envelope]: root };
}

// Builder compartido: las opciones no cambian entre solicitudes
const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_NODE_NAME,
    suppressBooleanAttributes: false,
    suppressEmptyNode: false,
    format: false,
});

/**
 * Serializa el envelope a XML (sin declaración <?xml?>)
 */
export function serializeEnvelope(envelope: Envelope): string {
    return builder.build(toXmlDocument(envelope));
}
