import * as fs from 'fs/promises'
import * as path from 'path'
import { ProjectConfig, loadBlueprintModule, loadProjectConfig, ConfigEnvironment } from '../config'
import { PackageDefinition } from '../ledger/runtime'
import { parseScenario } from '../parsers/scenario'
import { STD_PACKAGES } from '../std'
import { Scenario } from '../types/scenario'

export interface ProjectLoaderOptions {
  loadStdPackages?: boolean
  env?: ConfigEnvironment
}

const IGNORED_DIRS = new Set(['node_modules', 'dist', '.git', '.idea', '.vscode'])

/**
 * Reads a project: `ledger.yaml`, the blueprint packages it declares, and every scenario
 * under `scenarios/`.
 */
export class ProjectLoader {
  public scenarios: Map<string, Scenario> = new Map()
  public packages: Map<string, PackageDefinition> = new Map()
  public config: ProjectConfig = { manifestDir: 'manifests', blueprints: {} }

  constructor(
    public readonly projectRoot: string,
    private readonly options: ProjectLoaderOptions = {}
  ) {}

  async load(): Promise<void> {
    this.config = await loadProjectConfig(this.projectRoot, this.options.env)

    if (this.options.loadStdPackages !== false) {
      for (const [name, definition] of Object.entries(STD_PACKAGES)) {
        this.packages.set(name, definition)
      }
    }
    // Project packages replace std packages of the same name
    for (const [name, modulePath] of Object.entries(this.config.blueprints)) {
      this.packages.set(name, loadBlueprintModule(name, modulePath))
    }

    const scenariosPath = path.join(this.projectRoot, 'scenarios')
    if (await this.pathExists(scenariosPath)) {
      await this.loadScenariosFromDir(scenariosPath)
    }
  }

  private async loadScenariosFromDir(dir: string): Promise<void> {
    const files = await this.findScenarioFiles(dir)
    for (const filePath of files.sort()) {
      const content = await fs.readFile(filePath, 'utf-8')
      let scenario: Scenario
      try {
        scenario = parseScenario(content)
      } catch (error) {
        throw new Error(`${path.relative(this.projectRoot, filePath)}: ${error instanceof Error ? error.message : String(error)}`)
      }
      const existing = this.scenarios.get(scenario.name)
      if (existing) {
        throw new Error(`Duplicate scenario name "${scenario.name}" in ${filePath} and ${existing._path}`)
      }
      scenario._path = filePath
      this.scenarios.set(scenario.name, scenario)
    }
  }

  /**
   * Recursively finds all scenario files (.yaml/.yml) in a directory.
   */
  private async findScenarioFiles(dir: string): Promise<string[]> {
    let results: string[] = []
    const list = await fs.readdir(dir, { withFileTypes: true })
    for (const dirent of list) {
      const fullPath = path.resolve(dir, dirent.name)
      if (dirent.isDirectory()) {
        if (!IGNORED_DIRS.has(dirent.name)) {
          results = results.concat(await this.findScenarioFiles(fullPath))
        }
      } else if (dirent.isFile() && (dirent.name.endsWith('.yaml') || dirent.name.endsWith('.yml'))) {
        results.push(fullPath)
      }
    }
    return results
  }

  private async pathExists(p: string): Promise<boolean> {
    try {
      await fs.access(p)
      return true
    } catch {
      return false
    }
  }
}
