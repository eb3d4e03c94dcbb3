/**
 * Integration tests for the transaction processor against the embedded store
 */

import { ApiError } from '../../../src/middlewares/errorHandler';
import { ClientRegistry } from '../../../src/services/ledger/client.registry';
import { InMemoryLedgerRepository } from '../../../src/services/ledger/memoryLedger.repository';
import { TransactionService } from '../../../src/services/transaction/transaction.service';
import { ErrorCode } from '../../../src/types/errors';

const expectApiError = async (promise: Promise<unknown>, code: ErrorCode, statusCode: number) => {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err
  );
  expect(error).toBeInstanceOf(ApiError);
  expect(error).toMatchObject({ errorCode: code, statusCode });
};

describe('TransactionService', () => {
  let repository: InMemoryLedgerRepository;
  let registry: ClientRegistry;
  let service: TransactionService;

  beforeEach(async () => {
    repository = new InMemoryLedgerRepository();
    await repository.provision([
      { clientId: 1, limit: 100000 },
      { clientId: 2, limit: 80000 },
    ]);
    registry = new ClientRegistry(repository);
    service = new TransactionService(repository, registry);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should apply a debit and return limit and new balance', async () => {
    const result = await service.applyTransaction(1, { amount: 1, kind: 'debit', description: 'x' });

    expect(result.limit).toBe(100000);
    expect(result.balance).toBe(-1);
    expect(result.transaction).toMatchObject({ clientId: 1, amount: 1, kind: 'debit', description: 'x' });
  });

  it('should apply a credit', async () => {
    const result = await service.applyTransaction(2, { amount: 500, kind: 'credit', description: 'salary' });
    expect(result.balance).toBe(500);
  });

  it('should reject an overdraft with LIMIT_EXCEEDED', async () => {
    await expectApiError(
      service.applyTransaction(1, { amount: 100001, kind: 'debit', description: 'big' }),
      ErrorCode.LIMIT_EXCEEDED,
      422
    );

    const snapshot = await repository.readStatement(1, 10);
    expect(snapshot?.balance).toBe(0);
  });

  it('should reject an unknown client before looking at the entry', async () => {
    const applySpy = jest.spyOn(repository, 'applyTransaction');

    await expectApiError(
      service.applyTransaction(6, { amount: -1, kind: 'debit', description: '' }),
      ErrorCode.CLIENT_NOT_FOUND,
      404
    );
    expect(applySpy).not.toHaveBeenCalled();
  });

  it('should reject an invalid entry with per-field details', async () => {
    const error = await service
      .applyTransaction(1, { amount: 0, kind: 'credit', description: 'abcdefghijk' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      errorCode: ErrorCode.INVALID_INPUT,
      statusCode: 422,
      validationErrors: {
        amount: ['Amount must be a positive integer number of cents'],
        description: ['Description must be 1 to 10 characters'],
      },
    });
  });

  it('should map a store failure to STORAGE_UNAVAILABLE', async () => {
    jest.spyOn(repository, 'applyTransaction').mockRejectedValueOnce(new Error('connection reset'));

    await expectApiError(
      service.applyTransaction(1, { amount: 1, kind: 'credit', description: 'x' }),
      ErrorCode.STORAGE_UNAVAILABLE,
      503
    );
  });

  it('should map a registry failure to STORAGE_UNAVAILABLE', async () => {
    jest.spyOn(repository, 'listClients').mockRejectedValueOnce(new Error('connection reset'));

    await expectApiError(
      service.applyTransaction(1, { amount: 1, kind: 'credit', description: 'x' }),
      ErrorCode.STORAGE_UNAVAILABLE,
      503
    );
  });

  it('should map a not_found result from the store to CLIENT_NOT_FOUND', async () => {
    jest.spyOn(repository, 'applyTransaction').mockResolvedValueOnce({ status: 'not_found' });

    await expectApiError(
      service.applyTransaction(1, { amount: 1, kind: 'credit', description: 'x' }),
      ErrorCode.CLIENT_NOT_FOUND,
      404
    );
  });

  it('should reject a credit that would overflow the balance with INVALID_INPUT', async () => {
    await service.applyTransaction(1, { amount: Number.MAX_SAFE_INTEGER, kind: 'credit', description: 'max' });

    const error = await service
      .applyTransaction(1, { amount: Number.MAX_SAFE_INTEGER, kind: 'credit', description: 'max' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      errorCode: ErrorCode.INVALID_INPUT,
      statusCode: 422,
      validationErrors: { value: ['Value would take the balance beyond the supported range'] },
    });
    const snapshot = await repository.readStatement(1, 10);
    expect(snapshot?.balance).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('should keep clients independent', async () => {
    await service.applyTransaction(1, { amount: 100000, kind: 'debit', description: 'max' });
    const result = await service.applyTransaction(2, { amount: 80000, kind: 'debit', description: 'max' });

    expect(result.balance).toBe(-80000);
  });
});
