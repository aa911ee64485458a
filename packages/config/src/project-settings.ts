/**
 * Project settings loader
 *
 * Reads the remote execution section of the engine settings that sit next to
 * a project file:
 *
 *   <projectDir>/<Name>.uproject
 *   <projectDir>/Config/DefaultEngine.ini
 *     [/Script/PythonScriptPlugin.PythonScriptPluginSettings]
 *     bRemoteExecution=True
 *     RemoteExecutionMulticastGroupEndpoint=239.0.0.1:6766
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import ini from 'ini';
import { InvalidConfigError, InvalidProjectPathError } from '@remote-exec/utils/errors';
import { ProjectSettingsSchema, type ProjectSettings, type RemoteExecutionConfig } from './schemas.js';
import {
  createRemoteExecutionConfig,
  parseEndpoint,
  type RemoteExecutionConfigOptions,
} from './remote-config.js';

export const PROJECT_FILE_EXTENSION = '.uproject';
export const SETTINGS_DIR = 'Config';
export const SETTINGS_FILE = 'DefaultEngine.ini';
export const SETTINGS_SECTION = '/Script/PythonScriptPlugin.PythonScriptPluginSettings';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The ini parser nests dotted section names ("a.b" -> { a: { b } }), so look
 * the section up both flat and nested.
 */
function findSection(document: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const flat = document[name];
  if (isRecord(flat)) return flat;

  let current: unknown = document;
  for (const part of name.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return isRecord(current) ? current : undefined;
}

function isEnabled(value: string | boolean | undefined): boolean {
  if (typeof value === 'boolean') return value;
  if (value === undefined) return false;
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function getProjectName(projectFile: string): string {
  return path.basename(projectFile, path.extname(projectFile));
}

export function getSettingsPath(projectFile: string): string {
  return path.join(path.dirname(projectFile), SETTINGS_DIR, SETTINGS_FILE);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Parse the remote execution section out of an ini document.
 */
export function parseProjectSettings(content: string, source = SETTINGS_FILE): ProjectSettings {
  const document = ini.parse(content);
  const section = findSection(document, SETTINGS_SECTION);
  if (!section) {
    throw new InvalidConfigError(`Section [${SETTINGS_SECTION}] not found in ${source}`);
  }

  const parsed = ProjectSettingsSchema.safeParse(section);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidConfigError(`Invalid remote execution settings in ${source}: ${details}`);
  }
  return parsed.data;
}

/**
 * Read the settings file that belongs to a project file.
 */
export async function readProjectSettings(projectFile: string): Promise<ProjectSettings> {
  if (path.extname(projectFile) !== PROJECT_FILE_EXTENSION || !(await isFile(projectFile))) {
    throw new InvalidProjectPathError(projectFile);
  }

  const settingsPath = getSettingsPath(projectFile);
  if (!(await isFile(settingsPath))) {
    throw new InvalidProjectPathError(`Can't find: ${settingsPath}`);
  }

  return parseProjectSettings(await fs.readFile(settingsPath, 'utf-8'), settingsPath);
}

/**
 * Map engine settings onto config options. Absent keys are left undefined so
 * the built-in defaults apply.
 */
export function settingsToConfigOptions(settings: ProjectSettings): RemoteExecutionConfigOptions {
  if (!isEnabled(settings.bRemoteExecution)) {
    throw new InvalidConfigError('Remote execution is not enabled in the project settings (bRemoteExecution).');
  }

  const options: RemoteExecutionConfigOptions = {};
  if (settings.RemoteExecutionMulticastGroupEndpoint) {
    options.multicastGroup = parseEndpoint(settings.RemoteExecutionMulticastGroupEndpoint);
  }
  if (settings.RemoteExecutionMulticastBindAddress) {
    options.multicastBindAddress = settings.RemoteExecutionMulticastBindAddress;
  }
  if (settings.RemoteExecutionMulticastTtl !== undefined) {
    options.multicastTtl = Number(settings.RemoteExecutionMulticastTtl);
  }
  if (settings.RemoteExecutionReceiveBufferSizeBytes !== undefined) {
    options.bufferSize = Number(settings.RemoteExecutionReceiveBufferSizeBytes);
  }
  return options;
}

/**
 * Build a config from a project file. The target name defaults to the project
 * file's base name so that the matching peer is picked when several run.
 */
export async function loadProjectConfig(
  projectFile: string,
  overrides: RemoteExecutionConfigOptions = {}
): Promise<RemoteExecutionConfig> {
  const settings = await readProjectSettings(projectFile);
  return createRemoteExecutionConfig({
    ...settingsToConfigOptions(settings),
    targetName: getProjectName(projectFile),
    ...overrides,
  });
}
