import { describe, it, expect, beforeEach } from 'vitest';
import { QueryEngine } from '../queryEngine';
import { createEngine } from './helpers';

describe('CREATE TABLE / DROP TABLE', () =>
{
	let engine: QueryEngine;

	beforeEach(() =>
	{
		engine = createEngine();
	});

	it('should create a table and make it visible in the store', () =>
	{
		expect(engine.execute('CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, score REAL DEFAULT 0)'))
			.toBe("Table 'users' created");

		const collection = engine.getStore().getCollection('users');
		expect(collection?.schema.toString()).toBe('users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, score REAL DEFAULT 0)');
		expect(collection?.rows).toEqual([]);
	});

	it('should default the column type to TEXT and accept lower-case keywords', () =>
	{
		engine.execute("create table notes (body, author text default 'anon' not null);");

		expect(engine.getStore().getCollection('notes')?.schema.columns).toEqual([
			{ name: 'body', type: 'TEXT', primaryKey: false, notNull: false, defaultValue: null },
			{ name: 'author', type: 'TEXT', primaryKey: false, notNull: true, defaultValue: 'anon' }
		]);
	});

	it('should render string defaults as quoted literals', () =>
	{
		engine.execute("CREATE TABLE notes (title TEXT DEFAULT 'a b', owner TEXT DEFAULT 'O''Neil', pages INTEGER DEFAULT 1)");

		expect(engine.getStore().getCollection('notes')?.schema.toString())
			.toBe("notes (title TEXT DEFAULT 'a b', owner TEXT DEFAULT 'O''Neil', pages INTEGER DEFAULT 1)");
	});

	it('should refuse to create an existing table unless IF NOT EXISTS is given', () =>
	{
		engine.execute('CREATE TABLE t (a INTEGER)');

		expect(engine.run('CREATE TABLE t (b TEXT)')).toMatchObject({
			status: 'error', category: 'semantic', text: "ERROR: Table 't' already exists"
		});
		expect(engine.execute('CREATE TABLE IF NOT EXISTS t (b TEXT)')).toBe("Table 't' already exists (skipped)");
		expect(engine.getStore().getCollection('t')?.schema.getColumnNames()).toEqual(['a']);
	});

	it('should drop a table', () =>
	{
		engine.execute('CREATE TABLE t (a INTEGER)');

		expect(engine.execute('DROP TABLE t;')).toBe("Table 't' dropped");
		expect(engine.getStore().hasCollection('t')).toBe(false);
	});

	it('should refuse to drop a missing table unless IF EXISTS is given', () =>
	{
		expect(engine.run('DROP TABLE t')).toMatchObject({ category: 'semantic', text: "ERROR: Table 't' does not exist" });
		expect(engine.execute('DROP TABLE IF EXISTS t')).toBe("Table 't' does not exist (skipped)");
	});

	describe('column definition errors', () =>
	{
		const cases: [string, string, string][] = [
			['CREATE TABLE t (a INTEGER PRIMARY KEY, b INTEGER PRIMARY KEY)', 'semantic', 'ERROR: Table can have only one PRIMARY KEY'],
			['CREATE TABLE t (a, b, a)', 'semantic', "ERROR: Duplicate column name 'a'"],
			['CREATE TABLE t (a INTEGER PRIMARY)', 'syntax', "ERROR: Expected KEY after PRIMARY in column 'a'"],
			['CREATE TABLE t (a NOT UNIQUE)', 'syntax', "ERROR: Expected NULL after NOT in column 'a'"],
			['CREATE TABLE t (a DEFAULT)', 'syntax', "ERROR: Expected value after DEFAULT in column 'a'"],
			['CREATE TABLE t (a INTEGER TEXT)', 'syntax', "ERROR: Multiple types specified for column 'a'"],
			['CREATE TABLE t (a INTEGER UNIQUE)', 'syntax', "ERROR: Unknown keyword 'UNIQUE' in column 'a'"],
			['CREATE TABLE t ()', 'syntax', 'ERROR: Table must have at least one column'],
			['CREATE TABLE t', 'syntax', 'ERROR: Invalid CREATE TABLE syntax: CREATE TABLE t'],
			['CREATE TABLE t (9a INTEGER)', 'syntax', 'ERROR: Invalid column name: 9a']
		];

		it.each(cases)('%s', (statement, category, firstLine) =>
		{
			const result = engine.run(statement);

			expect(result.category).toBe(category);
			expect(result.text.split('\n')[0]).toBe(firstLine);
			expect(engine.getStore().hasCollection('t')).toBe(false);
		});
	});

	it('should report a malformed DROP', () =>
	{
		expect(engine.execute('DROP TABLE a b').split('\n')).toEqual([
			'ERROR: Invalid DROP TABLE syntax: DROP TABLE a b',
			'Expected: DROP TABLE [IF EXISTS] name'
		]);
	});
});
