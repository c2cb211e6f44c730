import inquirer from 'inquirer'
import chalk from 'chalk'
import type { ClusterInfo, ClusterRef } from '../../types'

/**
 * Prompt for confirmation using inquirer's list type
 */
export async function promptConfirm(
  message: string,
  defaultValue: boolean = true,
): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: string }>([
    {
      type: 'list',
      name: 'confirmed',
      message,
      choices: [
        { name: 'Yes', value: 'yes' },
        { name: 'No', value: 'no' },
      ],
      default: defaultValue ? 'yes' : 'no',
    },
  ])

  return confirmed === 'yes'
}

/**
 * Prompt for cluster selection from a list
 * @param clusters - List of clusters to choose from
 * @param message - Prompt message
 */
export async function promptClusterSelect(
  clusters: ClusterInfo[],
  message: string = 'Select cluster:',
): Promise<ClusterRef | null> {
  if (clusters.length === 0) {
    return null
  }

  const choices = clusters.map((c) => ({
    name: `${c.version}/${c.name} ${chalk.gray(`(port ${c.port})`)} ${
      c.running ? chalk.green('● online') : chalk.gray('○ down')
    }`,
    value: { version: c.version, name: c.name },
    short: `${c.version}/${c.name}`,
  }))

  const { cluster } = await inquirer.prompt<{ cluster: ClusterRef }>([
    {
      type: 'list',
      name: 'cluster',
      message,
      choices,
    },
  ])

  return cluster
}
