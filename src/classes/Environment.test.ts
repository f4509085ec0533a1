import { describe, it, expect } from 'vitest';
import { Environment } from './Environment';
import { UndefinedMutationError } from './exceptions';

describe('Environment', () => {
    it('returns nil for unknown names', () => {
        expect(new Environment().get('missing')).toBeNull();
    });

    it('defines and overwrites in the current scope', () => {
        const env = new Environment();
        env.define('x', 1);
        env.define('x', 2);
        expect(env.get('x')).toBe(2);
        expect(env.names()).toEqual(['x']);
    });

    it('looks names up through parents', () => {
        const root = new Environment();
        root.define('x', 'outer');
        const inner = root.child().child();
        expect(inner.get('x')).toBe('outer');
        expect(inner.has('x')).toBe(true);
        expect(inner.hasOwn('x')).toBe(false);
    });

    it('shadows without touching the parent on define', () => {
        const root = new Environment();
        root.define('x', 1);
        const inner = root.child();
        inner.define('x', 2);
        expect(inner.get('x')).toBe(2);
        expect(root.get('x')).toBe(1);
    });

    it('assigns to the nearest scope that binds the name', () => {
        const root = new Environment();
        root.define('x', 1);
        const middle = root.child();
        const inner = middle.child();
        inner.assign('x', 5);
        expect(root.get('x')).toBe(5);
        expect(inner.hasOwn('x')).toBe(false);
    });

    it('keeps a nil binding distinct from no binding', () => {
        const root = new Environment();
        root.define('x', null);
        const inner = root.child();
        inner.assign('x', 3);
        expect(root.get('x')).toBe(3);
    });

    it('fails to assign an unbound name', () => {
        const env = new Environment();
        expect(() => env.assign('ghost', 1)).toThrow(UndefinedMutationError);
        expect(() => env.assign('ghost', 1)).toThrow("Undefined variable 'ghost'.");
    });
});
