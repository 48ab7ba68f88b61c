import { QuerySyntaxError } from './errors';

/**
 * Scalar stored in a row cell or written as a literal in a statement.
 */
export type SqlValue = string | number | null;

/**
 * A table row: column name to value. Rows are replaced, never mutated.
 */
export type Row = Readonly<Record<string, SqlValue>>;

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?\d+\.\d+$/;
const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Removes matching outer quotes and collapses doubled inner quotes.
 * Returns undefined when the text is not a quoted literal.
 */
export function unquote(text: string): string | undefined
{
	if (text.length < 2) return undefined;

	const quote = text[0];
	if ((quote !== '\'' && quote !== '"') || text[text.length - 1] !== quote)
	{
		return undefined;
	}

	return text.slice(1, -1).split(quote + quote).join(quote);
}

/**
 * Best-effort literal inference used by every statement parser:
 * NULL, signed integers, decimals, quoted strings, otherwise the bare text.
 */
export function parseLiteral(text: string): SqlValue
{
	const trimmed = text.trim();

	if (trimmed.toUpperCase() === 'NULL') return null;

	const quoted = unquote(trimmed);
	if (quoted !== undefined) return quoted;

	if (INTEGER_PATTERN.test(trimmed) || DECIMAL_PATTERN.test(trimmed)) return parseNumber(trimmed);

	return trimmed;
}

/**
 * Reads numeric literal text. Integers must fit in a double exactly.
 * @throws QuerySyntaxError for an integer outside the safe range
 */
export function parseNumber(text: string): number
{
	const value = Number(text);
	if (INTEGER_PATTERN.test(text) && !Number.isSafeInteger(value))
	{
		throw new QuerySyntaxError(`Integer literal out of range: ${text}`);
	}
	return value;
}

/**
 * True for finite numbers and strings that read as integers or decimals.
 */
export function isNumericValue(value: SqlValue): boolean
{
	if (typeof value === 'number') return Number.isFinite(value);
	if (typeof value === 'string') return NUMERIC_PATTERN.test(value.trim());
	return false;
}

/**
 * Orders two non-null values: numerically when both are numeric,
 * otherwise by UTF-16 code units.
 */
export function compareValues(a: string | number, b: string | number): -1 | 0 | 1
{
	if (isNumericValue(a) && isNumericValue(b))
	{
		const left = Number(a);
		const right = Number(b);
		return left < right ? -1 : left > right ? 1 : 0;
	}

	const left = String(a);
	const right = String(b);
	return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Renders a cell for result output.
 */
export function formatValue(value: SqlValue): string
{
	return value === null ? 'NULL' : String(value);
}

/**
 * Renders a value back into literal syntax (strings single-quoted).
 */
export function toLiteral(value: SqlValue): string
{
	if (value === null) return 'NULL';
	if (typeof value === 'number') return String(value);
	return `'${value.split('\'').join('\'\'')}'`;
}
