import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { column, createEngine, seedUsers } from './helpers';

describe('SAVE DATABASE / LOAD DATABASE', () =>
{
	let dir: string;

	beforeEach(() =>
	{
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stage-sql-'));
	});

	afterEach(() =>
	{
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('should save and load a database between engines', () =>
	{
		const source = createEngine();
		seedUsers(source);
		const file = path.join(dir, 'users');

		expect(source.execute(`SAVE DATABASE '${file}'`)).toBe(`Database saved to '${file}.stagedb'`);

		const target = createEngine();
		target.execute('CREATE TABLE scratch (a INTEGER)');

		expect(target.execute(`LOAD DATABASE '${file}.stagedb';`)).toBe(`Database loaded from '${file}.stagedb' (1 table)`);
		expect(target.getStore().collectionNames()).toEqual(['users']);
		expect(target.execute('SELECT * FROM users')).toBe(source.execute('SELECT * FROM users'));
		expect(column(target.execute('SELECT name FROM users WHERE age IS NULL'), 'name')).toEqual(['Dave']);
	});

	it('should keep constraints and defaults after loading', () =>
	{
		const source = createEngine();
		seedUsers(source);
		source.execute(`save database "${path.join(dir, 'db')}"`);

		const target = createEngine();
		target.execute(`load database "${path.join(dir, 'db')}"`);

		expect(target.execute("INSERT INTO users (id, name) VALUES (1, 'Twin')")).toBe("ERROR: Duplicate value 1 for PRIMARY KEY column 'id'");
		expect(target.execute("INSERT INTO users (id, name) VALUES (6, 'Frank')")).toBe("1 row inserted into 'users'");
		expect(column(target.execute('SELECT city FROM users WHERE id = 6'), 'city')).toEqual(['NYC']);
	});

	it('should leave the store untouched when loading fails', () =>
	{
		const engine = createEngine();
		seedUsers(engine);
		const missing = path.join(dir, 'missing');

		expect(engine.run(`LOAD DATABASE '${missing}'`)).toMatchObject({
			status: 'error',
			category: 'storage',
			text: `ERROR: Database file '${missing}.stagedb' not found`
		});
		expect(engine.getStore().getCollection('users')?.rows).toHaveLength(5);
	});

	it('should require a quoted path', () =>
	{
		const result = createEngine().run('SAVE DATABASE backup');

		expect(result.category).toBe('syntax');
		expect(result.text.split('\n')[0]).toBe('ERROR: Invalid database path in: SAVE DATABASE backup');
	});
});
