import { task } from 'hardhat/config'
import { PROPERTIES } from '../../harness/properties'

task('erc20-props-list', 'Prints the ERC20 property catalog').setAction(async () => {
  for (const p of PROPERTIES) {
    console.log(`${p.id}  ${p.name.padEnd(44)} ${p.mode.padEnd(5)}  ${p.description}`)
  }
})
