export type { RowSourceContractConfig } from './rowSourceContract.js'
export { describeRowSourceContract } from './rowSourceContract.js'
