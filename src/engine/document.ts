/**
 * Document loader: YAML text → tagged `DocumentValue` tree.
 *
 * Works on the parsed YAML node tree rather than `yaml.parse()` output so
 * that mapping order survives exactly as written (plain objects would hoist
 * integer-like keys to the front).
 */
import { isAlias, isMap, isScalar, isSeq, parseDocument, type Document } from 'yaml';
import { DocumentParseError, SchemaError } from '../errors';
import type { DocumentValue, MappingEntry, ScalarValue } from '../types/mindmap';
import { formatScalarValue } from './scalar';

type ParsedDocument = Document.Parsed;

function resolveAlias(node: unknown, doc: ParsedDocument): unknown {
    return isAlias(node) ? node.resolve(doc) : node;
}

function toScalar(value: unknown): ScalarValue['value'] | null {
    if (value === null || value === undefined) return null;
    if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'bigint' ||
        typeof value === 'boolean'
    ) {
        return value;
    }
    return String(value);
}

function toKey(node: unknown, doc: ParsedDocument): string {
    const resolved = resolveAlias(node, doc);
    if (resolved === null || resolved === undefined) return 'null';
    if (isScalar(resolved)) return formatScalarValue(toScalar(resolved.value));
    throw new SchemaError('Mapping keys must be scalars');
}

function toDocumentValue(node: unknown, doc: ParsedDocument): DocumentValue | null {
    const resolved = resolveAlias(node, doc);
    if (resolved === null || resolved === undefined) return null;

    if (isMap(resolved)) {
        // A repeated key keeps its first position and takes the last value.
        const entries: MappingEntry[] = [];
        const positions = new Map<string, number>();
        for (const pair of resolved.items) {
            const key = toKey(pair.key, doc);
            const value = toDocumentValue(pair.value, doc);
            const position = positions.get(key);
            if (position === undefined) {
                positions.set(key, entries.length);
                entries.push({ key, value });
            } else {
                entries[position] = { key, value };
            }
        }
        return { kind: 'mapping', entries };
    }

    if (isSeq(resolved)) {
        const items: DocumentValue[] = [];
        for (const item of resolved.items) {
            const value = toDocumentValue(item, doc);
            if (value) items.push(value);
        }
        return { kind: 'sequence', items };
    }

    if (isScalar(resolved)) {
        const value = toScalar(resolved.value);
        return value === null ? null : { kind: 'scalar', value };
    }

    throw new SchemaError('Unsupported YAML node in mindmap document');
}

/**
 * Parse a YAML mindmap document.
 *
 * Returns null for an empty document. The top-level shape is not checked
 * here; graph assembly owns that rule.
 */
export function parseMindmapDocument(text: string): DocumentValue | null {
    const doc = parseDocument(text, { intAsBigInt: true, uniqueKeys: false });
    const [firstError] = doc.errors;
    if (firstError) {
        throw new DocumentParseError(`Invalid YAML: ${firstError.message}`, { cause: firstError });
    }
    return toDocumentValue(doc.contents, doc);
}
