import { describe, it, expect } from "vitest";
import { marshalMessage, messageName } from "./marshal.js";

class GetUser {
    constructor(public id: number, public tags?: string[]) {}
}

class Wrapped {
    readonly xmlName = 'tns:GetOrder';
    orderId = 'A-1';
}

describe('messageName', () => {
    it('usa el nombre del constructor para instancias de clase', () => {
        expect(messageName(new GetUser(1))).toBe('GetUser');
    });

    it('usa el nombre local de xmlName en objetos planos', () => {
        expect(messageName({ xmlName: 'tns:ListOrders', page: 1 })).toBe('ListOrders');
    });

    it('usa el nombre local de la única clave raíz de un objeto plano', () => {
        expect(messageName({ 'tns:Ping': { '@_id': '1' } })).toBe('Ping');
        expect(messageName({ a: 1, b: 2 })).toBe('');
    });

    it('devuelve cadena vacía para null o undefined', () => {
        expect(messageName(null)).toBe('');
        expect(messageName(undefined)).toBe('');
    });
});

describe('marshalMessage', () => {
    it('envuelve una instancia de clase en un elemento con el nombre del constructor', () => {
        expect(marshalMessage(new GetUser(7, ['a', 'b']))).toEqual({ GetUser: { id: 7, tags: ['a', 'b'] } });
    });

    it('omite propiedades undefined', () => {
        expect(marshalMessage(new GetUser(7))).toEqual({ GetUser: { id: 7 } });
    });

    it('usa xmlName como nombre del elemento y no lo emite como hijo', () => {
        expect(marshalMessage(new Wrapped())).toEqual({ 'tns:GetOrder': { orderId: 'A-1' } });
    });

    it('emite directamente las claves de un objeto plano', () => {
        const message = { 'tns:Ping': { '@_id': '1', when: new Date(Date.UTC(2024, 0, 2)), skip: null } };
        expect(marshalMessage(message)).toEqual({ 'tns:Ping': { '@_id': '1', when: '2024-01-02T00:00:00.000Z' } });
    });

    it('rechaza referencias circulares', () => {
        const node: { name: string; self?: unknown } = { name: 'x' };
        node.self = node;
        expect(() => marshalMessage(node)).toThrow(TypeError);
    });
});
