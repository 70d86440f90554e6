/**
 * Slots de namespace adicionales del envelope (xmlns:tns0 .. xmlns:tns14).
 *
 * La capacidad es fija: solo existen estos 15 slots y cualquier otra clave del
 * mapeo configurado se descarta sin error.
 */
export const NAMESPACE_SLOTS = [
    "tns0", "tns1", "tns2", "tns3", "tns4",
    "tns5", "tns6", "tns7", "tns8", "tns9",
    "tns10", "tns11", "tns12", "tns13", "tns14",
] as const;

export type NamespaceSlot = typeof NAMESPACE_SLOTS[number];

/**
 * Par (slot, URI) en el orden fijo de NAMESPACE_SLOTS; la URI es undefined si el slot está libre
 */
export type NamespaceSlotEntry = readonly [slot: NamespaceSlot, uri: string | undefined];

export function isNamespaceSlot(name: string): name is NamespaceSlot {
    return NAMESPACE_SLOTS.some(slot => slot === name);
}

/**
 * Reparte el mapeo de namespaces usados en los 15 slots fijos.
 * Devuelve siempre 15 entradas; las claves no reconocidas se ignoran.
 */
export function namespaceSlotsFrom(usedNamespaces?: Readonly<Record<string, string>>): NamespaceSlotEntry[] {
    const assigned = new Map<NamespaceSlot, string>();
    for (const [name, uri] of Object.entries(usedNamespaces ?? {})) {
        if (isNamespaceSlot(name)) {
            assigned.set(name, uri);
        }
    }
    return NAMESPACE_SLOTS.map((slot): NamespaceSlotEntry => [slot, assigned.get(slot)]);
}
