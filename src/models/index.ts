export { Client, IClient } from './Client';
export { Transaction, ITransaction } from './Transaction';
