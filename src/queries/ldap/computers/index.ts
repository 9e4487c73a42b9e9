export { computerAccountsQuery } from './computer-accounts';
