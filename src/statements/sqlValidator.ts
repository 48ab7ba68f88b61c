import { getLogger } from '../logger';
import { QuerySyntaxError } from '../errors';
import { ColumnType, COLUMN_TYPES } from '../storage/schema';

/**
 * Validation of the identifier and keyword fragments extracted by the
 * statement parsers. Every method throws QuerySyntaxError on bad input.
 */
export class SqlValidator
{
	private static readonly logger = getLogger('SqlValidator');

	/**
	 * Table and column names: letter or underscore first, then letters,
	 * digits and underscores, at most 128 characters.
	 * @returns The identifier unchanged
	 */
	static validateIdentifier(identifier: string, role: 'table' | 'column' = 'column'): string
	{
		if (!identifier)
		{
			this.logger.debug('Rejected empty identifier', { role });
			throw new QuerySyntaxError(`Empty ${role} name`);
		}

		const pattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
		if (!pattern.test(identifier) || identifier.length > 128)
		{
			this.logger.debug('Rejected identifier', { identifier, role });
			throw new QuerySyntaxError(`Invalid ${role} name: ${identifier}`);
		}

		return identifier;
	}

	/**
	 * ORDER BY direction, case-insensitive. Defaults to ASC when absent.
	 */
	static validateDirection(direction: string | undefined): 'ASC' | 'DESC'
	{
		if (direction === undefined) return 'ASC';

		const upper = direction.toUpperCase();
		if (upper !== 'ASC' && upper !== 'DESC')
		{
			throw new QuerySyntaxError(`Invalid ORDER BY direction: ${direction}`, 'ASC or DESC');
		}
		return upper;
	}

	/**
	 * Column type keyword, case-insensitive.
	 */
	static validateColumnType(type: string): ColumnType
	{
		const upper = type.toUpperCase();
		const match = COLUMN_TYPES.find(t => t === upper);
		if (!match)
		{
			throw new QuerySyntaxError(`Unknown column type: ${type}`, COLUMN_TYPES.join(', '));
		}
		return match;
	}

	/**
	 * LIMIT / OFFSET operand: a non-negative integer.
	 */
	static validateCount(text: string, clause: 'LIMIT' | 'OFFSET'): number
	{
		if (!/^\d+$/.test(text))
		{
			throw new QuerySyntaxError(`Invalid ${clause} value: ${text}`, `${clause} <non-negative integer>`);
		}
		return parseInt(text, 10);
	}
}
