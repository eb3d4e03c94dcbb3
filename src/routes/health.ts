import { Router, Request, Response } from 'express';

import { getDatabaseStatus } from '../config/database';
import { clientRegistry, ledgerRepository } from '../services/ledger';

const router = Router();

const getLedgerStatus = () => {
  const storeReady = ledgerRepository.isReady();
  return {
    store: ledgerRepository.kind,
    ready: storeReady && clientRegistry.isLoaded(),
    provisionedClients: clientRegistry.ids().length,
  };
};

router.get('/', (_req: Request, res: Response) => {
  const ledger = getLedgerStatus();

  res.status(ledger.ready ? 200 : 503).json({
    status: ledger.ready ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    services: {
      ledger,
      ...(ledgerRepository.kind === 'mongo' && { database: getDatabaseStatus() }),
    },
  });
});

router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
  });
});

router.get('/ready', (_req: Request, res: Response) => {
  const { ready } = getLedgerStatus();

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ready' : 'not ready',
    timestamp: new Date().toISOString(),
  });
});

export default router;
