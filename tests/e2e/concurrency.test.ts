import { getStatement, getTestApp, postTransaction, resetTestLedger } from '../helpers';

const app = getTestApp();

describe('Concurrent Transactions', () => {
  beforeEach(async () => {
    await resetTestLedger();
  });

  it('should apply every concurrent debit exactly once', async () => {
    const responses = await Promise.all(
      Array.from({ length: 50 }, () => postTransaction(app, 1, { value: 1, type: 'd', description: 'burst' }))
    );

    expect(responses.every((response) => response.status === 200)).toBe(true);

    const statement = await getStatement(app, 1);
    expect(statement.body.balance.total).toBe(-50);
  });

  it('should never let concurrent debits break the limit', async () => {
    // Client 2 has an 80000 limit: only 8 debits of 10000 fit
    const responses = await Promise.all(
      Array.from({ length: 12 }, () =>
        postTransaction(app, 2, { value: 10000, type: 'd', description: 'race' })
      )
    );

    expect(responses.filter((response) => response.status === 200)).toHaveLength(8);
    expect(responses.filter((response) => response.status === 422)).toHaveLength(4);

    const statement = await getStatement(app, 2);
    expect(statement.body.balance.total).toBe(-80000);
  });

  it('should serve statements whose balance matches the transactions they list', async () => {
    // At most 10 transactions, so every statement lists the whole history
    const writes = Array.from({ length: 10 }, (_, i) =>
      postTransaction(app, 3, {
        value: 100 + i,
        type: i % 2 === 0 ? 'c' : 'd',
        description: `mix-${i}`,
      })
    );
    const reads = Array.from({ length: 20 }, () => getStatement(app, 3));

    const [posted, statements] = await Promise.all([Promise.all(writes), Promise.all(reads)]);

    expect(posted.every((response) => response.status === 200)).toBe(true);
    for (const statement of statements) {
      expect(statement.status).toBe(200);
      const listed: { value: number; type: string }[] = statement.body.latest_transactions;
      const signedSum = listed.reduce((sum, tx) => sum + (tx.type === 'c' ? tx.value : -tx.value), 0);
      expect(statement.body.balance.total).toBe(signedSum);
    }

    // Credits 100, 102, 104, 106, 108; debits 101, 103, 105, 107, 109
    const final = await getStatement(app, 3);
    expect(final.body.balance.total).toBe(-5);
    expect(final.body.latest_transactions).toHaveLength(10);
  });

  it('should keep clients independent under load', async () => {
    await Promise.all([
      ...Array.from({ length: 20 }, () => postTransaction(app, 4, { value: 5, type: 'c', description: 'four' })),
      ...Array.from({ length: 20 }, () => postTransaction(app, 5, { value: 5, type: 'd', description: 'five' })),
    ]);

    expect((await getStatement(app, 4)).body.balance.total).toBe(100);
    expect((await getStatement(app, 5)).body.balance.total).toBe(-100);
  });
});
