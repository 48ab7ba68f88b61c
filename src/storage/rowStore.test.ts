import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryRowStore } from './rowStore';
import { TableSchema, defineColumn } from './schema';

const users = new TableSchema('users', [
	defineColumn('id', { type: 'INTEGER', primaryKey: true }),
	defineColumn('name', { notNull: true }),
	defineColumn('city', { defaultValue: 'NYC' })
]);

describe('TableSchema', () =>
{
	it('should expose columns in declaration order', () =>
	{
		expect(users.getColumnNames()).toEqual(['id', 'name', 'city']);
		expect(users.getColumnCount()).toBe(3);
		expect(users.getPrimaryKey()).toBe('id');
		expect(users.hasColumn('email')).toBe(false);
	});

	it('should make primary keys NOT NULL', () =>
	{
		expect(users.getColumn('id')).toEqual({
			name: 'id', type: 'INTEGER', primaryKey: true, notNull: true, defaultValue: null
		});
	});

	it('should render its definition', () =>
	{
		expect(users.toString()).toBe("users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, city TEXT DEFAULT 'NYC')");
	});
});

describe('MemoryRowStore', () =>
{
	let store: MemoryRowStore;

	beforeEach(() =>
	{
		store = new MemoryRowStore();
		store.createCollection(users);
		store.insertRow('users', { id: 1, name: 'Alice', city: 'NYC' });
		store.insertRow('users', { id: 2, name: 'Bob', city: 'LA' });
	});

	it('should track collection existence', () =>
	{
		expect(store.hasCollection('users')).toBe(true);
		store.dropCollection('users');
		expect(store.hasCollection('users')).toBe(false);
		expect(store.getCollection('users')).toBeUndefined();
	});

	it('should refuse to create or drop twice', () =>
	{
		expect(() => store.createCollection(users)).toThrow("Table 'users' already exists");
		store.dropCollection('users');
		expect(() => store.dropCollection('users')).toThrow("Table 'users' does not exist");
	});

	it('should freeze stored rows and hand out snapshots', () =>
	{
		const snapshot = store.getCollection('users');
		expect(snapshot?.rows).toHaveLength(2);
		expect(Object.isFrozen(snapshot?.rows[0])).toBe(true);

		store.insertRow('users', { id: 3, name: 'Carol', city: null });
		expect(snapshot?.rows).toHaveLength(2);
	});

	it('should update matching rows by replacement', () =>
	{
		const before = store.getCollection('users')?.rows[1];

		const count = store.updateRows('users', { city: 'SF' }, row => row.id === 2);

		expect(count).toBe(1);
		expect(store.getCollection('users')?.rows.map(r => r.city)).toEqual(['NYC', 'SF']);
		expect(before).toEqual({ id: 2, name: 'Bob', city: 'LA' });
	});

	it('should update and delete every row without a predicate', () =>
	{
		expect(store.updateRows('users', { city: null })).toBe(2);
		expect(store.deleteRows('users')).toBe(2);
		expect(store.getCollection('users')?.rows).toEqual([]);
	});

	it('should delete matching rows', () =>
	{
		expect(store.deleteRows('users', row => row.name === 'Alice')).toBe(1);
		expect(store.getCollection('users')?.rows).toEqual([{ id: 2, name: 'Bob', city: 'LA' }]);
	});

	it('should list and clear collections', () =>
	{
		store.createCollection(new TableSchema('orders', [defineColumn('id')]));

		expect(store.collectionNames()).toEqual(['users', 'orders']);
		store.clear();
		expect(store.collectionNames()).toEqual([]);
	});
});
