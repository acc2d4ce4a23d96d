// Contract test suites

export type { DriverContractConfig } from './driverContract.js'
export { describeDriverContract } from './driverContract.js'
