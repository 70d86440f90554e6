/**
 * Capacidad opcional de los tipos de solicitud: fijar su propio tipo XML
 * (por ejemplo un atributo xsi:type) justo antes de serializarse.
 */
export interface XmlTyper {
    setXmlType(): void;
}

export function isXmlTyper(value: object): value is XmlTyper {
    return 'setXmlType' in value && typeof value.setXmlType === 'function';
}

// Objetos que se tratan como hojas: no se recorren sus propiedades
function isLeafObject(value: object): boolean {
    return value instanceof Date
        || value instanceof Map
        || value instanceof Set
        || value instanceof RegExp
        || value instanceof ArrayBuffer
        || ArrayBuffer.isView(value);
}

function walk(value: unknown, ancestors: Set<object>): void {
    if (typeof value !== 'object' || value === null) {
        return;
    }
    if (isLeafObject(value) || ancestors.has(value)) {
        return;
    }
    ancestors.add(value);
    try {
        if (Array.isArray(value)) {
            for (let i = 0; i < value.length; i++) {
                walk(value[i], ancestors);
            }
            return;
        }
        if (isXmlTyper(value)) {
            value.setXmlType();
        }
        // Las claves se leen después del hook: puede agregar atributos o hijos
        for (const key of Object.keys(value)) {
            walk(Reflect.get(value, key), ancestors);
        }
    } finally {
        ancestors.delete(value);
    }
}

/**
 * Recorre el grafo del mensaje e invoca setXmlType() en cada objeto que lo implemente,
 * antes de descender a sus propiedades. Modifica el mensaje en el lugar.
 *
 * Solo se corta la recursión sobre los nodos del camino actual (ciclos); un nodo
 * compartido por dos ramas se visita cada vez que se alcanza.
 */
export function setXmlType(message: unknown): void {
    walk(message, new Set<object>());
}
