import { describe, it, expect } from "vitest";
import { isXmlTyper, setXmlType } from "./xml-typer.js";

class Animal {
    '@_xsi:type'?: string;
    constructor(public name: string, private readonly calls: string[]) {}

    setXmlType(): void {
        this.calls.push(this.name);
        this['@_xsi:type'] = 'tns:Animal';
    }
}

describe('setXmlType', () => {
    it('invoca el hook en objetos anidados y en cada elemento de un arreglo, en orden', () => {
        const calls: string[] = [];
        const request = {
            owner: { pet: new Animal('firulais', calls) },
            pets: [new Animal('michi', calls), 'no-objeto', null, new Animal('piolín', calls)],
        };

        setXmlType(request);

        expect(calls).toEqual(['firulais', 'michi', 'piolín']);
        expect(request.owner.pet['@_xsi:type']).toBe('tns:Animal');
    });

    it('invoca el hook sobre la raíz antes de recorrer sus propiedades', () => {
        const order: string[] = [];
        const child = { setXmlType: () => order.push('hijo') };
        const root = {
            setXmlType(): void {
                order.push('raíz');
                Object.assign(root, { child });
            },
        };

        setXmlType(root);

        expect(order).toEqual(['raíz', 'hijo']);
    });

    it('invoca el hook sobre el mismo conjunto de nodos en cada recorrido', () => {
        const calls: string[] = [];
        const request = { a: new Animal('uno', calls), list: [new Animal('dos', calls)] };

        setXmlType(request);
        const first = [...calls];
        calls.length = 0;
        setXmlType(request);

        expect(first).toEqual(['uno', 'dos']);
        expect(calls).toEqual(first);
    });

    it('visita un nodo compartido por dos ramas cada vez que se alcanza', () => {
        const calls: string[] = [];
        const shared = new Animal('compartido', calls);

        setXmlType({ left: shared, right: shared });

        expect(calls).toEqual(['compartido', 'compartido']);
    });

    it('termina sobre grafos cíclicos', () => {
        const calls: string[] = [];
        const node: { animal: Animal; self?: unknown } = { animal: new Animal('ciclo', calls) };
        node.self = node;

        setXmlType(node);

        expect(calls).toEqual(['ciclo']);
    });

    it('no recorre escalares, null, Map ni Date', () => {
        const calls: string[] = [];
        const map = new Map([['k', new Animal('en-map', calls)]]);

        expect(() => setXmlType(undefined)).not.toThrow();
        expect(() => setXmlType(null)).not.toThrow();
        expect(() => setXmlType(42)).not.toThrow();
        setXmlType({ map, when: new Date(0) });

        expect(calls).toEqual([]);
    });
});

describe('isXmlTyper', () => {
    it('reconoce objetos con un método setXmlType', () => {
        expect(isXmlTyper({ setXmlType: () => undefined })).toBe(true);
        expect(isXmlTyper({ setXmlType: 'no' })).toBe(false);
        expect(isXmlTyper({})).toBe(false);
    });
});
