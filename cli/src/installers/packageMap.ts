import type { DistroFamily, LogicalPackage, OptionalPackage, PackageSpec, ResolvedPackage } from './types.js'

const NOT_APPLICABLE = null

// null marks a package the family's default repositories do not carry.
const PACKAGE_MAP: Record<LogicalPackage, Record<DistroFamily, string | null>> = {
  git: { debian: 'git', alpine: 'git', rhel: 'git' },
  yadm: { debian: 'yadm', alpine: 'yadm', rhel: 'yadm' },
  ansible: { debian: 'ansible', alpine: 'ansible', rhel: 'ansible' },
  'python3-pip': { debian: 'python3-pip', alpine: 'py3-pip', rhel: 'python3-pip' },
  powertop: { debian: 'powertop', alpine: 'powertop', rhel: 'powertop' },
  tlp: { debian: 'tlp', alpine: NOT_APPLICABLE, rhel: 'tlp' }
}

export interface CatalogEntry extends PackageSpec {
  readonly name: LogicalPackage
}

export const REQUIRED_PACKAGES: readonly CatalogEntry[] = [
  { name: 'git', required: true, description: 'Version control' },
  { name: 'yadm', required: true, description: 'Dotfiles manager' }
]

export const OPTIONAL_PACKAGE_NAMES = ['ansible', 'python3-pip', 'powertop', 'tlp'] as const satisfies readonly OptionalPackage[]

const OPTIONAL_DESCRIPTIONS: Record<OptionalPackage, string> = {
  ansible: 'Configuration management',
  'python3-pip': 'Python package installer',
  powertop: 'Power consumption monitor',
  tlp: 'Laptop power management'
}

export const OPTIONAL_PACKAGES: readonly (CatalogEntry & { readonly name: OptionalPackage })[] =
  OPTIONAL_PACKAGE_NAMES.map((name) => ({ name, required: false, description: OPTIONAL_DESCRIPTIONS[name] }))

export const PACKAGE_CATALOG: readonly CatalogEntry[] = [...REQUIRED_PACKAGES, ...OPTIONAL_PACKAGES]

export function mapName(logicalName: LogicalPackage, family: DistroFamily): ResolvedPackage {
  const name = PACKAGE_MAP[logicalName][family]
  return name === NOT_APPLICABLE ? { kind: 'not-applicable' } : { kind: 'concrete', name }
}

export function isLogicalPackage(name: string): name is LogicalPackage {
  return Object.prototype.hasOwnProperty.call(PACKAGE_MAP, name)
}
