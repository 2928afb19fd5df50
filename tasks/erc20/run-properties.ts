import { task, types } from 'hardhat/config'
import { Verdict } from '../../common/constants'
import { PROPERTIES, findProperty } from '../../harness/properties'
import { formatSummary, loadRunnerConfig, runProperties } from '../../harness/runner'
import { getSubjectFactory } from '../../harness/subjects'

interface RunParams {
  subject?: string
  property?: string
  runs?: number
  seed?: number
  noOutput: boolean
}

task('erc20-props', 'Checks a registered token against the ERC20 property catalog')
  .addOptionalParam('subject', 'Registered token to check (default PROPS_SUBJECT)', undefined, types.string)
  .addOptionalParam('property', 'A single property: id, number or name', undefined, types.string)
  .addOptionalParam('runs', 'Candidates per property (default PROPS_RUNS)', undefined, types.int)
  .addOptionalParam('seed', 'fast-check seed, to reproduce a run', undefined, types.int)
  .addFlag('noOutput', 'Suppress output')
  .setAction(async (params: RunParams) => {
    const { subject: defaultSubject, ...config } = loadRunnerConfig()
    const subject = params.subject ?? defaultSubject
    const factory = getSubjectFactory(subject)
    const properties = params.property ? [findProperty(params.property)] : PROPERTIES

    const log = params.noOutput ? undefined : (line: string) => console.log(line)
    log?.(`Checking ${properties.length} properties against ${subject}...`)

    const results = await runProperties(properties, factory, {
      ...config,
      numRuns: params.runs ?? config.numRuns,
      seed: params.seed ?? config.seed,
      log,
    })
    log?.(formatSummary(subject, results))

    const failed = results.filter((r) => r.verdict === Verdict.FAIL)
    if (failed.length > 0) {
      throw new Error(`${subject} violates ${failed.map((r) => r.id).join(', ')}`)
    }
    return results
  })
