export { userAccountsQuery } from './user-accounts';
