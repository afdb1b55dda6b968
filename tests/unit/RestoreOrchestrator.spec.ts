/**
 * Unit Tests: RestoreOrchestrator
 *
 * Drives the state machine against an in-process SQL Server stand-in and
 * checks which statements reach the engine on each branch.
 *
 * @see libs/restore/orchestrator.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { RestoreOrchestrator, RESTORE_STATEMENT_TIMEOUT_MS } from '../../libs/restore/orchestrator.js';
import { RestorePhase } from '../../libs/restore/phases.js';
import type { RestorePlan, RestoreTarget } from '../../libs/restore/restoreTypes.js';
import type { Sleep } from '../../libs/restore/lockRetry.js';
import { DatabaseState } from '../../libs/db/probe.js';
import { parseConnectionString } from '../../libs/db/connectionString.js';
import { toSqlIdentifier } from '../../libs/db/identifier.js';
import {
    FakeSqlServer,
    engineError,
    silentLogger,
    withAbsentDatabase,
    withExistingDatabase,
    withFileList
} from '../helpers/fakeSqlServer.js';

const TARGET: RestoreTarget = {
    databaseName: toSqlIdentifier('Sales'),
    connectionEndpoint: parseConnectionString('Server=127.0.0.1,5007;User ID=sa;Password=test-password;Initial Catalog=Sales;TrustServerCertificate=true')
};

const PLAN: RestorePlan = {
    backupPath: '/var/opt/mssql/backup/sales.bak',
    dataDir: '/var/opt/mssql/data',
    ownerLogin: 'sa'
};

const TWO_FILE_MANIFEST = [
    { LogicalName: 'Sales', Type: 'D' },
    { LogicalName: 'Sales_log', Type: 'L' }
];

const DROP = /DROP DATABASE/;
const RESTORE = /^RESTORE DATABASE/;

describe('RestoreOrchestrator', () => {
    let server: FakeSqlServer;
    let delays: number[];
    let sleep: Sleep;

    beforeEach(() => {
        server = new FakeSqlServer();
        delays = [];
        sleep = async (ms) => {
            delays.push(ms);
        };
    });

    function orchestrator(): RestoreOrchestrator {
        return new RestoreOrchestrator({ connector: server, sleep });
    }

    it('leaves a populated database alone', async () => {
        withFileList(withExistingDatabase(server, 7), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Done);
        assert.strictEqual(outcome.restored, false);
        assert.strictEqual(outcome.databaseState, DatabaseState.PresentPopulated);
        assert.strictEqual(outcome.tableCount, 7);
        assert.deepStrictEqual(outcome.phases, [RestorePhase.Probing, RestorePhase.Reclaiming, RestorePhase.Done]);
        assert.strictEqual(server.matching(DROP).length, 0);
        assert.strictEqual(server.matching(/^RESTORE/).length, 0);
    });

    it('drops an empty database once and restores it with relocated files', async () => {
        withFileList(withExistingDatabase(server, 0), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Done);
        assert.strictEqual(outcome.restored, true);
        assert.strictEqual(outcome.databaseState, DatabaseState.PresentEmpty);
        assert.deepStrictEqual(outcome.warnings, []);
        assert.deepStrictEqual(outcome.phases, [
            RestorePhase.Probing,
            RestorePhase.Reclaiming,
            RestorePhase.Dropping,
            RestorePhase.Restoring,
            RestorePhase.Finalizing,
            RestorePhase.Done
        ]);

        const drops = server.matching(DROP);
        assert.strictEqual(drops.length, 1);
        assert.strictEqual(drops[0].text, 'ALTER DATABASE [Sales] SET SINGLE_USER WITH ROLLBACK IMMEDIATE;\nDROP DATABASE [Sales];');

        const restores = server.matching(RESTORE);
        assert.strictEqual(restores.length, 1);
        assert.match(restores[0].text, /MOVE N'Sales' TO N'\/var\/opt\/mssql\/data\/Sales_0\.mdf'/);
        assert.match(restores[0].text, /MOVE N'Sales_log' TO N'\/var\/opt\/mssql\/data\/Sales_1_log\.ldf'/);
        assert.match(restores[0].text, /REPLACE, RECOVERY$/);
        assert.strictEqual(restores[0].timeoutMs, RESTORE_STATEMENT_TIMEOUT_MS);
        assert.strictEqual(restores[0].database, 'master');
    });

    it('restores an absent database without dropping anything', async () => {
        withFileList(withAbsentDatabase(server), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Done);
        assert.strictEqual(outcome.databaseState, DatabaseState.Absent);
        assert.deepStrictEqual(outcome.phases, [
            RestorePhase.Probing,
            RestorePhase.Restoring,
            RestorePhase.Finalizing,
            RestorePhase.Done
        ]);
        assert.strictEqual(server.matching(DROP).length, 0);
        assert.strictEqual(server.matching(/KILL/).length, 0);
        assert.strictEqual(server.matching(RESTORE).length, 1);
    });

    it('finalizes on master and reassigns ownership from the restored database', async () => {
        withFileList(withAbsentDatabase(server), TWO_FILE_MANIFEST);

        await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        const trust = server.matching(/TRUSTWORTHY/);
        assert.strictEqual(trust.length, 1);
        assert.strictEqual(trust[0].text, 'ALTER DATABASE [Sales] SET TRUSTWORTHY ON;');
        assert.strictEqual(trust[0].database, 'master');

        const owner = server.matching(/sp_changedbowner/);
        assert.strictEqual(owner.length, 1);
        assert.strictEqual(owner[0].database, 'Sales');
        assert.deepStrictEqual(owner[0].params, { owner: 'sa' });

        assert.deepStrictEqual(server.opened.map(e => e.database), ['master', 'Sales']);
        assert.strictEqual(server.closedSessions, 2);
    });

    it('retries the drop on lock contention and then restores', async () => {
        server.on(DROP, (_statement, call) => {
            if (call < 2) throw engineError(3702, 'Cannot drop database "Sales" because it is currently in use.');
        });
        withFileList(withExistingDatabase(server, 0), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(server.matching(DROP).length, 3);
        assert.deepStrictEqual(delays, [2000, 2000]);
        assert.strictEqual(outcome.state, RestorePhase.Done);
        assert.strictEqual(server.matching(RESTORE).length, 1);
    });

    it('fails without restoring once every drop attempt hits lock contention', async () => {
        server.on(DROP, () => {
            throw engineError(3702, 'Cannot drop database "Sales" because it is currently in use.');
        });
        withFileList(withExistingDatabase(server, 0), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Failed);
        assert.strictEqual(outcome.error?.kind, 'LockContention');
        assert.deepStrictEqual(outcome.phases, [
            RestorePhase.Probing,
            RestorePhase.Reclaiming,
            RestorePhase.Dropping,
            RestorePhase.Failed
        ]);
        assert.strictEqual(server.matching(DROP).length, 3);
        assert.strictEqual(server.matching(/^RESTORE/).length, 0);
    });

    it('fails immediately on any other drop error', async () => {
        server.on(DROP, () => {
            throw engineError(5011, 'User does not have permission to alter database');
        });
        withFileList(withExistingDatabase(server, 0), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Failed);
        assert.strictEqual(outcome.error?.kind, 'RestoreStatementFailed');
        assert.strictEqual(server.matching(DROP).length, 1);
        assert.deepStrictEqual(delays, []);
    });

    it('does not retry a failed RESTORE statement', async () => {
        server.on(RESTORE, () => {
            throw engineError(3201, 'Cannot open backup device');
        });
        withFileList(withAbsentDatabase(server), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Failed);
        assert.strictEqual(outcome.restored, false);
        assert.strictEqual(outcome.error?.kind, 'RestoreStatementFailed');
        assert.strictEqual(outcome.error?.engineErrorNumber, 3201);
        assert.strictEqual(server.matching(RESTORE).length, 1);
        assert.strictEqual(server.matching(/TRUSTWORTHY/).length, 0);
    });

    it('fails on an empty backup manifest', async () => {
        withFileList(withAbsentDatabase(server), []);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Failed);
        assert.strictEqual(server.matching(RESTORE).length, 0);
    });

    it('reports a failed ownership reassignment as a warning on a finished run', async () => {
        server.on(/sp_changedbowner/, () => {
            throw engineError(15110, 'The proposed new database owner is already a user or aliased in the database.');
        });
        withFileList(withAbsentDatabase(server), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Done);
        assert.strictEqual(outcome.restored, true);
        assert.deepStrictEqual(outcome.warnings, [
            'Could not reassign database owner to sa: The proposed new database owner is already a user or aliased in the database.'
        ]);
    });

    it('reports a failed TRUSTWORTHY change as a warning and still reassigns ownership', async () => {
        server.on(/TRUSTWORTHY/, () => {
            throw engineError(15247, 'User does not have permission to perform this action.');
        });
        withFileList(withAbsentDatabase(server), TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Done);
        assert.deepStrictEqual(outcome.warnings, [
            'Could not set TRUSTWORTHY ON: User does not have permission to perform this action.'
        ]);
        assert.strictEqual(server.matching(/sp_changedbowner/).length, 1);
    });

    it('fails when the engine cannot be reached', async () => {
        server.failOpenWith(new Error('Failed to connect to 127.0.0.1:5007'));

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Failed);
        assert.deepStrictEqual(outcome.phases, [RestorePhase.Probing, RestorePhase.Failed]);
        assert.strictEqual(server.statements.length, 0);
    });

    it('never drops a database whose table count cannot be read', async () => {
        server
            .on(/FROM sys\.databases/, () => [{ count: 1 }])
            .on(/sys\.tables WHERE is_ms_shipped = 0/, () => [{ '': 42 }]);
        withFileList(server, TWO_FILE_MANIFEST);

        const outcome = await orchestrator().run(TARGET, PLAN, { logger: silentLogger });

        assert.strictEqual(outcome.state, RestorePhase.Failed);
        assert.strictEqual(outcome.error?.kind, 'RestoreStatementFailed');
        assert.deepStrictEqual(outcome.phases, [RestorePhase.Probing, RestorePhase.Failed]);
        assert.strictEqual(server.matching(DROP).length, 0);
        assert.strictEqual(server.matching(/^RESTORE/).length, 0);
    });
});
