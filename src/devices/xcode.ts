/**
 * xcodebuild and simctl orchestration
 *
 * Only builds, boots, installs, launches and captures; the descriptor engine
 * never depends on anything here.
 */
import * as path from 'path';
import { z } from 'zod';
import { BuildFailedError, SimulatorError } from '../core/errors.js';
import type { CommandRunner } from './runner.js';

/** Lines of xcodebuild output kept on failure */
const OUTPUT_TAIL_LINES = 20;

export const DEFAULT_DESTINATION = 'generic/platform=iOS Simulator';

export interface BuildOptions {
  /** .xcodeproj or .xcworkspace */
  project: string;
  scheme: string;
  destination?: string;
  configuration?: string;
  derivedDataPath?: string;
}

export interface SimulatorDevice {
  udid: string;
  name: string;
  state: string;
  runtime: string;
}

const simctlDevicesSchema = z.object({
  devices: z.record(
    z.array(
      z.object({
        udid: z.string(),
        name: z.string(),
        state: z.string(),
        isAvailable: z.boolean().optional(),
      })
    )
  ),
});

/**
 * Where xcodebuild places the app for a simulator build
 */
export function productPath(derivedDataPath: string, scheme: string, configuration = 'Debug'): string {
  return path.join(derivedDataPath, 'Build', 'Products', `${configuration}-iphonesimulator`, `${scheme}.app`);
}

export function tailLines(output: string, count = OUTPUT_TAIL_LINES): string {
  const lines = output.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
  return lines.slice(-count).join('\n');
}

export class XcodeToolchain {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * @throws BuildFailedError with the tail of the build output
   */
  async build(options: BuildOptions): Promise<void> {
    const args = [
      options.project.endsWith('.xcworkspace') ? '-workspace' : '-project',
      options.project,
      '-scheme',
      options.scheme,
      '-destination',
      options.destination ?? DEFAULT_DESTINATION,
    ];
    if (options.configuration) args.push('-configuration', options.configuration);
    if (options.derivedDataPath) args.push('-derivedDataPath', options.derivedDataPath);
    args.push('build');

    const result = await this.runner.run('xcodebuild', args);
    if (result.exitCode !== 0) {
      throw new BuildFailedError(result.exitCode, tailLines(result.all));
    }
  }

  async listDevices(): Promise<SimulatorDevice[]> {
    const stdout = await this.simctl(['list', 'devices', '-j']);
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new SimulatorError('simctl list', 'output is not JSON');
    }
    const parsed = simctlDevicesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SimulatorError('simctl list', 'unexpected device list format');
    }

    const devices: SimulatorDevice[] = [];
    for (const [runtime, entries] of Object.entries(parsed.data.devices)) {
      for (const entry of entries) {
        if (entry.isAvailable === false) continue;
        devices.push({ udid: entry.udid, name: entry.name, state: entry.state, runtime });
      }
    }
    return devices;
  }

  /**
   * Boot a simulator unless it is already running
   *
   * @returns false when the device was already booted
   */
  async bootSimulator(udid: string): Promise<boolean> {
    const device = (await this.listDevices()).find(d => d.udid === udid);
    if (!device) {
      throw new SimulatorError('simctl boot', `no available simulator with UDID ${udid}`);
    }
    if (device.state === 'Booted') {
      return false;
    }
    await this.simctl(['boot', udid]);
    return true;
  }

  async install(udid: string, appPath: string): Promise<void> {
    await this.simctl(['install', udid, appPath]);
  }

  async launch(udid: string, bundleId: string): Promise<void> {
    await this.simctl(['launch', udid, bundleId]);
  }

  async screenshot(udid: string, outputPath: string): Promise<void> {
    await this.simctl(['io', udid, 'screenshot', outputPath]);
  }

  private async simctl(args: string[]): Promise<string> {
    const result = await this.runner.run('xcrun', ['simctl', ...args]);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new SimulatorError(`simctl ${args[0]}`, detail);
    }
    return result.stdout;
  }
}
