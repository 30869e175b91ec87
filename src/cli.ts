#!/usr/bin/env node
import { Command } from 'commander'
import * as dotenv from 'dotenv'
import * as fs from 'fs'
import * as path from 'path'
import Converger, { GatewayOptions } from './index'
import { parseTasks, Task } from './params'
import print, { failure, Output, stdout } from './print'
import * as log from './log'
import { errorMessage } from './errors'

type CommonOptions = {
  envFile: string
  region?: string
}

type ApplyOptions = CommonOptions & {
  check?: boolean
}

export function readTasks(file: string) {
  const raw = fs.readFileSync(path.resolve(file), 'utf8')
  return parseTasks(JSON.parse(raw))
}

function loadEnv(options: CommonOptions) {
  dotenv.config({ path: path.resolve(options.envFile) })
}

export type ProgramOptions = {
  converger?: (options: GatewayOptions) => Converger
  write?: Output
}

export function createProgram(deps: ProgramOptions = {}) {
  const createConverger = deps.converger || ((options: GatewayOptions) => new Converger(options))
  const write = deps.write || stdout

  const program = new Command('gateway-state')
    .description('Converge AWS API Gateway resources to a declared state')

  program
    .command('apply')
    .description('Run every task in a JSON task file, in order')
    .argument('<file>', 'JSON file holding an array of tasks')
    .option('--check', 'Report what would change without changing anything')
    .option('--env-file <path>', 'dotenv file to load', '.env')
    .option('--region <region>', 'AWS region (defaults to AWS_REGION)')
    .action(async (file: string, options: ApplyOptions) => {
      loadEnv(options)

      let tasks: Task[]
      try {
        tasks = readTasks(file)
      } catch (ex) {
        write(log.stringify(failure(ex)))
        throw ex
      }

      const converger = createConverger({
        region: options.region,
        checkMode: options.check
      })

      for (const task of tasks) {
        await print(converger.run(task), task.description, write)
      }
    })

  program
    .command('vpc-links')
    .description('List every VPC link in the region')
    .option('--env-file <path>', 'dotenv file to load', '.env')
    .option('--region <region>', 'AWS region (defaults to AWS_REGION)')
    .action(async (options: CommonOptions) => {
      loadEnv(options)
      const converger = createConverger({ region: options.region })
      await print(converger.listVpcLinks(), undefined, write)
    })

  return program
}

/**
 * Failures have already been written to stdout; the exit code carries them
 */
export async function main(argv: string[], deps: ProgramOptions = {}) {
  try {
    await createProgram(deps).parseAsync(argv)
  } catch (err) {
    log.error(errorMessage(err))
    process.exitCode = 1
  }
}

if (require.main === module) {
  void main(process.argv)
}
