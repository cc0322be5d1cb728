import { defineCommand } from 'citty'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { provisionCommand } from './commands/provision.js'
import { doctorCommand } from './commands/doctor.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
)

export const root = defineCommand({
  meta: {
    name: 'hostprep',
    version: packageJson.version,
    description: 'Provision a fresh Linux host with retrying, distro-aware package installs'
  },
  subCommands: {
    provision: provisionCommand,
    doctor: doctorCommand
  }
})
