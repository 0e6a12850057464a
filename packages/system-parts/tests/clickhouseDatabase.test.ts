import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, test } from 'node:test';
import {
  CONNECTION_SETTINGS,
  closeClickHouseTransport,
  createInlineTransport,
  getClickHouseTransport,
  type ClickHouseTransport
} from '../src/clickhouse/client';
import {
  getInlineStatements,
  isInlineModeEnabled,
  resetInlineClickHouseStore,
  seedInlineRows
} from '../src/clickhouse/inlineStore';
import { ClickHouseDatabase, connectClickHouseDatabase } from '../src/clickhouseDatabase';
import type { SystemPartsConfig } from '../src/config';
import { InvalidArgumentError } from '../src/errors';
import { createLogger } from '../src/logger';
import { SystemPart } from '../src/systemPart';
import { buildPartRow } from './utils/recordingDatabase';

const silentLogger = createLogger('silent');

function inlineConfig(database: string): SystemPartsConfig {
  return {
    logLevel: 'silent',
    clickhouse: {
      host: 'inline',
      httpPort: 8123,
      username: 'default',
      password: 'test-secret',
      database,
      secure: false,
      requestTimeoutMs: 30_000
    }
  };
}

beforeEach(() => {
  resetInlineClickHouseStore();
});

afterEach(async () => {
  await closeClickHouseTransport();
  resetInlineClickHouseStore();
});

describe('ClickHouseDatabase', () => {
  test('runs system.parts queries through the transport', async () => {
    seedInlineRows('system.parts', [buildPartRow(), buildPartRow({ name: '201901_4_4_0', active: 0 })]);
    const database = new ClickHouseDatabase({
      dbName: 'default',
      transport: createInlineTransport(),
      logger: silentLogger
    });

    const parts = await SystemPart.fetchAll(database);

    assert.deepEqual(
      parts.map((part) => [part.name, part.active]),
      [
        ['201901_1_3_1', true],
        ['201901_4_4_0', false]
      ]
    );
    const statements = getInlineStatements();
    assert.equal(statements.length, 1);
    assert.ok(statements[0].query.endsWith("FROM system.parts WHERE database='default'"));
  });

  test('passes settings through unmodified for partition operations', async () => {
    const database = new ClickHouseDatabase({
      dbName: 'default',
      transport: createInlineTransport(),
      logger: silentLogger
    });
    const part = SystemPart.fromRow(buildPartRow());
    const settings = { max_execution_time: 60 };

    await part.drop(database, settings);

    assert.deepEqual(getInlineStatements(), [
      { query: "ALTER TABLE `default`.`events` DROP PARTITION '201901'", settings }
    ]);
  });

  test('rethrows transport failures unchanged', async () => {
    const failure = new Error('Code: 60. DB::Exception: Table default.events does not exist');
    const transport: ClickHouseTransport = {
      async command() {
        throw failure;
      },
      async queryRows() {
        throw failure;
      },
      async close() {
        return;
      }
    };
    const database = new ClickHouseDatabase({ dbName: 'default', transport, logger: silentLogger });
    const part = SystemPart.fromRow(buildPartRow());

    await assert.rejects(part.detach(database), (error: unknown) => error === failure);
    await assert.rejects(SystemPart.fetchActive(database), (error: unknown) => error === failure);
  });

  test('requires a database name', () => {
    assert.throws(
      () => new ClickHouseDatabase({ dbName: '', transport: createInlineTransport() }),
      (error: unknown) => {
        assert.ok(error instanceof InvalidArgumentError);
        assert.equal(error.message, 'ClickHouseDatabase requires a dbName');
        return true;
      }
    );
  });
});

describe('ClickHouse transport', () => {
  test('inline host selects the in-process store', () => {
    assert.equal(isInlineModeEnabled({ host: 'INLINE' }), true);
    assert.equal(isInlineModeEnabled({ host: 'clickhouse' }), process.env.CLICKHOUSE_INLINE === 'true');
  });

  test('clients ask the server for ISO DateTime output', () => {
    assert.deepEqual(CONNECTION_SETTINGS, { date_time_output_format: 'iso' });
  });

  test('transports are cached per connection settings', () => {
    const config = inlineConfig('default');
    const first = getClickHouseTransport(config.clickhouse);
    assert.equal(getClickHouseTransport({ ...config.clickhouse }), first);
    assert.notEqual(getClickHouseTransport(inlineConfig('analytics').clickhouse), first);
  });

  test('connectClickHouseDatabase targets the configured database', async () => {
    seedInlineRows('system.parts', [buildPartRow({ database: 'analytics' })]);
    const database = connectClickHouseDatabase({ config: inlineConfig('analytics'), logger: silentLogger });

    assert.equal(database.dbName, 'analytics');
    const parts = await SystemPart.fetchActive(database);
    assert.equal(parts.length, 1);
    assert.equal(parts[0].database, 'analytics');
    assert.ok(getInlineStatements()[0].query.endsWith("WHERE active AND database='analytics'"));
  });
});
