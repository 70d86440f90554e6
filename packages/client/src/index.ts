export { SoapClient, createClient, type RoundTripper } from './client.js';
export { validateConfig, type ClientConfig } from './config.js';
export {
    CONTENT_TYPE_HEADER,
    DEFAULT_CONTENT_TYPE,
    HTTP_STATUS_OK,
    MAX_ERROR_BODY_BYTES,
    SOAP_ACTION_HEADER,
    USER_AGENT_HEADER,
    soap12ContentType,
} from './constants.js';
export {
    HTTPError,
    SoapConfigError,
    SoapDeserializationError,
    SoapError,
    SoapSerializationError,
    SoapTransportError,
    isHTTPError,
    type SoapErrorOptions,
    type SoapTransportErrorOptions,
} from './errors.js';
export { readBody, releaseBody, type ReadBodyOptions } from './body.js';
export { declaredCharset, decodeXml, decoderForLabel } from './charset.js';
export { debug, debugContext, isDebugMode, setDebugMode } from './logger.js';
export { AxiosTransport, type SoapHttpRequest, type SoapHttpResponse, type SoapTransport } from './transport.js';
export {
    SOAP11_ENVELOPE_URI,
    SOAP12_ENVELOPE_URI,
    XSI_NAMESPACE,
    authHeader,
    type Message,
    type XmlTyper,
} from '@soapwire/runtime';
