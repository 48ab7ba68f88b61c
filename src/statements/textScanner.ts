/**
 * Quote-aware helpers for slicing statement text.
 *
 * Literals may be single- or double-quoted; a doubled quote inside a
 * literal stands for the quote character itself.
 */

import { QuerySyntaxError } from '../errors';

/**
 * Walks the text and reports, for each index, whether it lies inside a
 * quoted literal (opening and closing quotes count as inside).
 */
function quotedMask(text: string): boolean[]
{
	const mask: boolean[] = new Array(text.length).fill(false);
	let quote: string | null = null;

	for (let i = 0; i < text.length; i++)
	{
		const char = text[i];

		if (quote === null)
		{
			if (char === '\'' || char === '"')
			{
				quote = char;
				mask[i] = true;
			}
			continue;
		}

		mask[i] = true;
		if (char === quote)
		{
			if (text[i + 1] === quote)
			{
				mask[i + 1] = true;
				i++;
			}
			else
			{
				quote = null;
			}
		}
	}

	return mask;
}

/**
 * Same-length copy of `text` with the contents of quoted literals replaced
 * by underscores, so keyword searches never match inside a string.
 */
export function maskQuoted(text: string): string
{
	const mask = quotedMask(text);
	let masked = '';
	for (let i = 0; i < text.length; i++)
	{
		masked += mask[i] && text[i] !== '\'' && text[i] !== '"' ? '_' : text[i];
	}
	return masked;
}

/**
 * Finds the first match of `pattern` outside quoted literals.
 * The pattern must not be global or sticky.
 */
export function findOutsideQuotes(text: string, pattern: RegExp): { index: number; length: number } | undefined
{
	const match = pattern.exec(maskQuoted(text));
	return match ? { index: match.index, length: match[0].length } : undefined;
}

/**
 * True when every quoted literal in the text is closed.
 */
export function quotesBalanced(text: string): boolean
{
	let quote: string | null = null;
	for (let i = 0; i < text.length; i++)
	{
		const char = text[i];
		if (quote === null)
		{
			if (char === '\'' || char === '"') quote = char;
		}
		else if (char === quote)
		{
			if (text[i + 1] === quote) i++;
			else quote = null;
		}
	}
	return quote === null;
}

/**
 * Splits on `separator` where it appears outside quotes and parentheses.
 * Parts are trimmed; quotes are kept so literals can still be told apart.
 */
export function splitTopLevel(text: string, separator: string): string[]
{
	const mask = quotedMask(text);
	const parts: string[] = [];
	let depth = 0;
	let start = 0;

	for (let i = 0; i < text.length; i++)
	{
		if (mask[i]) continue;

		const char = text[i];
		if (char === '(') depth++;
		else if (char === ')') depth--;
		else if (char === separator && depth === 0)
		{
			parts.push(text.slice(start, i).trim());
			start = i + 1;
		}
	}

	parts.push(text.slice(start).trim());
	return parts;
}

/**
 * Splits a VALUES section such as `(1, 'a'), (2, 'b')` into the inner text
 * of each tuple. Tuples are separated by the `) , (` boundary only, so
 * commas and parentheses inside quoted literals are left alone.
 */
export function splitTuples(section: string): string[]
{
	const trimmed = section.trim();
	if (!trimmed.startsWith('(') || !trimmed.endsWith(')'))
	{
		throw new QuerySyntaxError(`Invalid VALUES syntax: ${trimmed}`, '(value, ...) [, (value, ...)]');
	}

	const masked = maskQuoted(trimmed);
	const boundary = /\)\s*,\s*\(/g;
	const tuples: string[] = [];
	let start = 1;
	let match: RegExpExecArray | null;

	while ((match = boundary.exec(masked)) !== null)
	{
		tuples.push(trimmed.slice(start, match.index));
		start = match.index + match[0].length;
	}
	tuples.push(trimmed.slice(start, trimmed.length - 1));

	return tuples;
}

/**
 * Whitespace split that keeps quoted literals (including their spaces) whole.
 */
export function splitWords(text: string): string[]
{
	const mask = quotedMask(text);
	const words: string[] = [];
	let current = '';

	for (let i = 0; i < text.length; i++)
	{
		if (!mask[i] && /\s/.test(text[i]))
		{
			if (current !== '') words.push(current);
			current = '';
			continue;
		}
		current += text[i];
	}

	if (current !== '') words.push(current);
	return words;
}
