export {
  LinkStateSchema,
  LinkSchema,
  AccountTypeSchema,
  AccountSchema,
  TransactionStatusSchema,
  TransactionSchema,
  PostingSchema,
  TagSchema,
  CategorizationDirectiveSchema,
} from './ledger.js';

export type {
  LinkState,
  Link,
  AccountType,
  Account,
  TransactionStatus,
  Transaction,
  Posting,
  Tag,
  CategorizationDirective,
} from './ledger.js';
