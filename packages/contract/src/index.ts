// Contract test suites

export type { ScenarioContract } from './scenarioContract.js'
export { describeScenarioContract } from './scenarioContract.js'
