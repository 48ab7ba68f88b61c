import { describe, it, expect } from 'vitest';
import { IterationLimitError, QueryEngineError, QuerySyntaxError, SemanticError, StorageError } from './errors';

describe('errors', () =>
{
	it('should append the expected grammar to syntax errors', () =>
	{
		const error = new QuerySyntaxError('Invalid DROP TABLE syntax: DROP t', 'DROP TABLE [IF EXISTS] name');

		expect(error.message).toBe('Invalid DROP TABLE syntax: DROP t\nExpected: DROP TABLE [IF EXISTS] name');
		expect(error.category).toBe('syntax');
		expect(error.name).toBe('QuerySyntaxError');
		expect(error).toBeInstanceOf(QueryEngineError);
	});

	it('should categorise semantic and storage errors', () =>
	{
		const cause = new Error('EACCES');
		const storage = new StorageError('Cannot write database file', cause);

		expect(new SemanticError('x').category).toBe('semantic');
		expect(storage.category).toBe('storage');
		expect(storage.cause).toBe(cause);
		expect(storage).toBeInstanceOf(StorageError);
	});

	it('should keep the iteration limit outside the recoverable hierarchy', () =>
	{
		const error = new IterationLimitError(50);

		expect(error).toBeInstanceOf(IterationLimitError);
		expect(error).not.toBeInstanceOf(QueryEngineError);
		expect(error.message).toBe('Dispatcher exceeded maximum iterations (50). Possible infinite loop detected.');
	});
});
