import { QueryEngineConfig } from '../config';
import { LogLevel } from '../logger';
import { QueryEngine } from '../queryEngine';

export function createEngine(config: QueryEngineConfig = {}): QueryEngine
{
	return new QueryEngine({ logLevel: LogLevel.OFF, ...config });
}

/**
 * users(id INTEGER PRIMARY KEY, name TEXT NOT NULL, age INTEGER, city TEXT DEFAULT 'NYC')
 *
 * | id | name  | age  | city |
 * |----|-------|------|------|
 * | 1  | Alice | 30   | NYC  |
 * | 2  | Bob   | 25   | LA   |
 * | 3  | Carol | 35   | NYC  |
 * | 4  | Dave  | NULL | SF   |
 * | 5  | Eve   | 28   | LA   |
 */
export function seedUsers(engine: QueryEngine): void
{
	engine.execute("CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, age INTEGER, city TEXT DEFAULT 'NYC')");
	engine.execute(
		"INSERT INTO users VALUES (1, 'Alice', 30, 'NYC'), (2, 'Bob', 25, 'LA'), (3, 'Carol', 35, 'NYC'), (4, 'Dave', NULL, 'SF'), (5, 'Eve', 28, 'LA')"
	);
}

/**
 * Values of one column of a result text, in row order.
 */
export function column(result: string, name: string): string[]
{
	const lines = result.split('\n');
	if (lines.length < 5) return [];

	const index = lines[2].split('\t').indexOf(name);
	return lines.slice(4).map(line => line.split('\t')[index]);
}
