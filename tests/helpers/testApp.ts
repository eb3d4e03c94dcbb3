import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';

let testApp: Application | null = null;

export const getTestApp = (): Application => {
  if (!testApp) {
    testApp = createApp();
  }
  return testApp;
};

export const resetTestApp = (): void => {
  testApp = null;
};

export interface TransactionBody {
  value?: unknown;
  type?: unknown;
  description?: unknown;
}

export const postTransaction = (app: Application, clientId: number | string, body: TransactionBody) => {
  return request(app).post(`/clients/${clientId}/transactions`).send(body);
};

export const getStatement = (app: Application, clientId: number | string) => {
  return request(app).get(`/clients/${clientId}/statement`);
};
