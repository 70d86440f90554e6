import { TextDecoder } from 'util';

const DEFAULT_CHARSET = 'utf-8';

// La declaración <?xml ...?> va al inicio del documento; basta con mirar los primeros bytes
const PROLOG_SNIFF_BYTES = 512;

// Leído como latin1 el BOM de UTF-8 aparece como "ï»¿"
const PROLOG_PATTERN = /^(?:ï»¿)?\s*<\?xml\s[^>]*?\bencoding\s*=\s*["']([^"']+)["']/;

/**
 * Charset declarado en la declaración XML, o undefined si no hay ninguno
 */
export function declaredCharset(bytes: Buffer): string | undefined {
    const head = bytes.subarray(0, PROLOG_SNIFF_BYTES).toString('latin1');
    const match = PROLOG_PATTERN.exec(head);
    return match ? match[1].trim() : undefined;
}

// Documentos UTF-16 sin declaración legible en latin1: se detectan por su BOM
function bomCharset(bytes: Buffer): string | undefined {
    if (bytes.length >= 2 && bytes[0] === 0xFE && bytes[1] === 0xFF) return 'utf-16be';
    if (bytes.length >= 2 && bytes[0] === 0xFF && bytes[1] === 0xFE) return 'utf-16le';
    return undefined;
}

/**
 * Devuelve el decodificador para una etiqueta de charset (p. ej. "ISO-8859-1", "Shift_JIS")
 */
export function decoderForLabel(label: string): TextDecoder {
    try {
        return new TextDecoder(label);
    } catch (err) {
        throw new Error(`Charset no soportado: ${label}`, { cause: err });
    }
}

/**
 * Decodifica un documento XML según el charset que declara su prólogo (UTF-8 si no declara ninguno)
 */
export function decodeXml(bytes: Buffer): string {
    const label = bomCharset(bytes) ?? declaredCharset(bytes) ?? DEFAULT_CHARSET;
    return decoderForLabel(label).decode(bytes);
}
