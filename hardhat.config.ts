import { HardhatUserConfig } from 'hardhat/types'

import './tasks'

// No contracts: hardhat only hosts the property tasks
const config: HardhatUserConfig = {
  defaultNetwork: 'hardhat',
  paths: {
    sources: './contracts',
    tests: './test',
  },
  mocha: {
    timeout: 120_000,
  },
}

export default config
