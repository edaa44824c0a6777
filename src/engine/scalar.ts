/**
 * Label text for scalar values.
 *
 * Integers arrive as `bigint` so long digit runs survive intact; `number`
 * is reserved for floats, which always print with a fractional part or an
 * exponent (`1.0`, `1000.0`, `1e-05`, `1e+16`).
 */

function formatFloat(value: number): string {
    if (Number.isNaN(value)) return 'nan';
    if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
    if (value === 0) return Object.is(value, -0) ? '-0.0' : '0.0';

    const sign = value < 0 ? '-' : '';
    // Shortest round-trip digits, e.g. "1.23456e+2".
    const [mantissa, exponentText] = Math.abs(value).toExponential().split('e');
    const exponent = Number(exponentText);
    const digits = mantissa.replace('.', '');

    if (exponent < -4 || exponent >= 16) {
        const fraction = digits.slice(1);
        const exponentSign = exponent < 0 ? '-' : '+';
        const exponentDigits = String(Math.abs(exponent)).padStart(2, '0');
        return `${sign}${digits[0]}${fraction ? `.${fraction}` : ''}e${exponentSign}${exponentDigits}`;
    }
    if (exponent < 0) {
        return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
    }
    const integer = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0');
    const fraction = digits.slice(exponent + 1);
    return `${sign}${integer}.${fraction || '0'}`;
}

export function formatScalarValue(value: string | number | bigint | boolean | null): string {
    if (value === null) return 'null';
    if (typeof value === 'number') return formatFloat(value);
    return String(value);
}
