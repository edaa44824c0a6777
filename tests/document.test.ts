import assert from 'node:assert/strict';
import test from 'node:test';
import { parseMindmapDocument } from '../src/engine/document.ts';
import { DocumentParseError, SchemaError } from '../src/errors.ts';

test('parseMindmapDocument turns nested YAML into tagged values', () => {
    const document = parseMindmapDocument(
        ['Health:', '  Sleep: 8 hours', '  Habits:', '    - Walk', '    - 10000', '    - true'].join('\n'),
    );

    assert.deepEqual(document, {
        kind: 'mapping',
        entries: [
            {
                key: 'Health',
                value: {
                    kind: 'mapping',
                    entries: [
                        { key: 'Sleep', value: { kind: 'scalar', value: '8 hours' } },
                        {
                            key: 'Habits',
                            value: {
                                kind: 'sequence',
                                items: [
                                    { kind: 'scalar', value: 'Walk' },
                                    { kind: 'scalar', value: 10000n },
                                    { kind: 'scalar', value: true },
                                ],
                            },
                        },
                    ],
                },
            },
        ],
    });
});

test('parseMindmapDocument keeps keys in document order, integer-like keys included', () => {
    const document = parseMindmapDocument('b: 1\n2: two\na: 3\n');

    assert.equal(document?.kind, 'mapping');
    if (document?.kind !== 'mapping') return;
    assert.deepEqual(
        document.entries.map((entry) => entry.key),
        ['b', '2', 'a'],
    );
});

test('parseMindmapDocument maps empty values to null and drops null sequence items', () => {
    const document = parseMindmapDocument('Empty:\nList:\n  - one\n  - ~\n');

    assert.deepEqual(document, {
        kind: 'mapping',
        entries: [
            { key: 'Empty', value: null },
            { key: 'List', value: { kind: 'sequence', items: [{ kind: 'scalar', value: 'one' }] } },
        ],
    });
});

test('parseMindmapDocument resolves aliases to their anchored value', () => {
    const document = parseMindmapDocument('A: &shared x\nB: *shared\n');

    assert.deepEqual(document, {
        kind: 'mapping',
        entries: [
            { key: 'A', value: { kind: 'scalar', value: 'x' } },
            { key: 'B', value: { kind: 'scalar', value: 'x' } },
        ],
    });
});

test('parseMindmapDocument keeps integer digits and float spelling', () => {
    const document = parseMindmapDocument('A:\n  - 12345678901234567890\n  - 1.0\n  - 1e3\n');

    assert.deepEqual(document, {
        kind: 'mapping',
        entries: [
            {
                key: 'A',
                value: {
                    kind: 'sequence',
                    items: [
                        { kind: 'scalar', value: 12345678901234567890n },
                        { kind: 'scalar', value: 1 },
                        { kind: 'scalar', value: 1000 },
                    ],
                },
            },
        ],
    });
});

test('parseMindmapDocument formats numeric keys like leaf labels', () => {
    const document = parseMindmapDocument('1.0: a\n0x1F: b\n');

    assert.equal(document?.kind, 'mapping');
    if (document?.kind !== 'mapping') return;
    assert.deepEqual(
        document.entries.map((entry) => entry.key),
        ['1.0', '31'],
    );
});

test('parseMindmapDocument lets a repeated key take the last value in its first position', () => {
    const document = parseMindmapDocument('A: 1\nB: 2\nA: 3\n');

    assert.deepEqual(document, {
        kind: 'mapping',
        entries: [
            { key: 'A', value: { kind: 'scalar', value: 3n } },
            { key: 'B', value: { kind: 'scalar', value: 2n } },
        ],
    });
});

test('parseMindmapDocument returns null for an empty document', () => {
    assert.equal(parseMindmapDocument(''), null);
});

test('parseMindmapDocument reports malformed YAML as DocumentParseError', () => {
    assert.throws(() => parseMindmapDocument('A: [unclosed\n'), DocumentParseError);
});

test('parseMindmapDocument rejects collection keys', () => {
    assert.throws(() => parseMindmapDocument('? [a, b]\n: value\n'), SchemaError);
});
