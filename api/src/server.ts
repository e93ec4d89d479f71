import { logger } from '@booktrans/core';
import { createApp } from './app';
import { JobManager } from './jobManager';
import { InMemoryLedger } from './ledger';
import { PORT, TMP_DIR } from './config';

process.on('uncaughtException', (err) => {
    logger.error(`uncaughtException: ${err.stack || err}`);
});
process.on('unhandledRejection', (reason) => {
    logger.error(`unhandledRejection: ${reason instanceof Error ? reason.stack : String(reason)}`);
});

function start() {
    const ledger = new InMemoryLedger();
    const manager = new JobManager({ ledger });
    const app = createApp({ manager, ledger });
    app.listen(PORT, () => {
        logger.info(`API listening on http://localhost:${PORT} (scratch dir ${TMP_DIR})`);
    });
}

start();
