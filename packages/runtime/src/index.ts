export { authHeader, type AuthHeaderOptions } from './auth-header.js';
export { createEnvelope, serializeEnvelope, toXmlDocument, type Envelope, type EnvelopeOptions } from './envelope.js';
export { marshalMessage, messageName } from './marshal.js';
export {
    NAMESPACE_SLOTS,
    isNamespaceSlot,
    namespaceSlotsFrom,
    type NamespaceSlot,
    type NamespaceSlotEntry,
} from './namespaces.js';
export {
    SOAP11_ENVELOPE_URI,
    SOAP12_ENVELOPE_URI,
    SOAP_TAGS,
    XSI_NAMESPACE,
    localName,
    soapenv,
    type SoapTag,
} from './soap.js';
export {
    ATTRIBUTE_PREFIX,
    TEXT_NODE_NAME,
    XML_NAME_KEY,
    isXmlNode,
    type Message,
    type XmlNode,
    type XmlScalar,
    type XmlValue,
} from './types.js';
export { bindBody, parseEnvelope, unmarshalEnvelope, type ParsedEnvelope } from './unmarshal.js';
export { isXmlTyper, setXmlType, type XmlTyper } from './xml-typer.js';
