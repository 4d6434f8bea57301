/**
 * Tests for xcodebuild and simctl orchestration, against a scripted runner
 */
import * as path from 'path';
import { XcodeToolchain, productPath, tailLines, DEFAULT_DESTINATION } from '../../src/devices/xcode';
import type { CommandResult, CommandRunner } from '../../src/devices/runner';
import { BuildFailedError, SimulatorError } from '../../src/core/errors';

class ScriptedRunner implements CommandRunner {
  readonly calls: string[][] = [];

  constructor(private readonly responses: Array<Partial<CommandResult>> = []) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push([command, ...args]);
    const response = this.responses.shift() ?? {};
    const stdout = response.stdout ?? '';
    const stderr = response.stderr ?? '';
    return { exitCode: response.exitCode ?? 0, stdout, stderr, all: response.all ?? stdout };
  }
}

const UDID = '00000000-0000-0000-0000-000000000001';

function deviceList(state: string): string {
  return JSON.stringify({
    devices: {
      'com.apple.CoreSimulator.SimRuntime.iOS-17-0': [
        { udid: UDID, name: 'iPhone 15', state, isAvailable: true },
        { udid: 'gone', name: 'iPhone X', state: 'Shutdown', isAvailable: false },
      ],
    },
  });
}

describe('XcodeToolchain.build', () => {
  it('should build a project for the simulator', async () => {
    const runner = new ScriptedRunner();
    await new XcodeToolchain(runner).build({ project: 'Demo.xcodeproj', scheme: 'Demo' });

    expect(runner.calls).toEqual([
      ['xcodebuild', '-project', 'Demo.xcodeproj', '-scheme', 'Demo', '-destination', DEFAULT_DESTINATION, 'build'],
    ]);
  });

  it('should pass workspace, configuration and derived data', async () => {
    const runner = new ScriptedRunner();
    await new XcodeToolchain(runner).build({
      project: 'Demo.xcworkspace',
      scheme: 'Demo',
      destination: `id=${UDID}`,
      configuration: 'Release',
      derivedDataPath: 'build/DerivedData',
    });

    expect(runner.calls[0]).toEqual([
      'xcodebuild', '-workspace', 'Demo.xcworkspace', '-scheme', 'Demo', '-destination', `id=${UDID}`,
      '-configuration', 'Release', '-derivedDataPath', 'build/DerivedData', 'build',
    ]);
  });

  it('should fail with the end of the build log', async () => {
    const runner = new ScriptedRunner([{ exitCode: 65, all: 'Compiling\nerror: cannot find type\n** BUILD FAILED **\n' }]);
    const build = new XcodeToolchain(runner).build({ project: 'Demo.xcodeproj', scheme: 'Demo' });

    await expect(build).rejects.toThrow(BuildFailedError);
    await expect(build).rejects.toMatchObject({
      exitCode: 65,
      outputTail: 'Compiling\nerror: cannot find type\n** BUILD FAILED **',
    });
  });
});

describe('XcodeToolchain simulator commands', () => {
  it('should list only available devices', async () => {
    const runner = new ScriptedRunner([{ stdout: deviceList('Shutdown') }]);

    expect(await new XcodeToolchain(runner).listDevices()).toEqual([
      { udid: UDID, name: 'iPhone 15', state: 'Shutdown', runtime: 'com.apple.CoreSimulator.SimRuntime.iOS-17-0' },
    ]);
    expect(runner.calls).toEqual([['xcrun', 'simctl', 'list', 'devices', '-j']]);
  });

  it('should reject output it cannot read', async () => {
    await expect(new XcodeToolchain(new ScriptedRunner([{ stdout: 'nope' }])).listDevices())
      .rejects.toThrow('simctl list: output is not JSON');
    await expect(new XcodeToolchain(new ScriptedRunner([{ stdout: '{"devices": []}' }])).listDevices())
      .rejects.toThrow('simctl list: unexpected device list format');
  });

  it('should boot a shut down simulator', async () => {
    const runner = new ScriptedRunner([{ stdout: deviceList('Shutdown') }, {}]);

    expect(await new XcodeToolchain(runner).bootSimulator(UDID)).toBe(true);
    expect(runner.calls[1]).toEqual(['xcrun', 'simctl', 'boot', UDID]);
  });

  it('should leave a booted simulator alone', async () => {
    const runner = new ScriptedRunner([{ stdout: deviceList('Booted') }]);

    expect(await new XcodeToolchain(runner).bootSimulator(UDID)).toBe(false);
    expect(runner.calls).toHaveLength(1);
  });

  it('should refuse unknown or unavailable devices', async () => {
    const runner = new ScriptedRunner([{ stdout: deviceList('Shutdown') }]);
    await expect(new XcodeToolchain(runner).bootSimulator('gone')).rejects.toThrow(SimulatorError);
  });

  it('should install, launch and capture', async () => {
    const runner = new ScriptedRunner();
    const toolchain = new XcodeToolchain(runner);

    await toolchain.install(UDID, '/tmp/Demo.app');
    await toolchain.launch(UDID, 'com.example.demo');
    await toolchain.screenshot(UDID, 'shot.png');

    expect(runner.calls).toEqual([
      ['xcrun', 'simctl', 'install', UDID, '/tmp/Demo.app'],
      ['xcrun', 'simctl', 'launch', UDID, 'com.example.demo'],
      ['xcrun', 'simctl', 'io', UDID, 'screenshot', 'shot.png'],
    ]);
  });

  it('should surface simctl errors', async () => {
    const failing = new ScriptedRunner([{ exitCode: 149, stderr: 'Unable to boot device in current state\n' }]);
    await expect(new XcodeToolchain(failing).launch(UDID, 'com.example.demo'))
      .rejects.toThrow('simctl launch: Unable to boot device in current state');

    const silent = new ScriptedRunner([{ exitCode: 2 }]);
    await expect(new XcodeToolchain(silent).install(UDID, 'Demo.app')).rejects.toThrow('simctl install: exit code 2');
  });
});

describe('helpers', () => {
  it('should locate the simulator build product', () => {
    expect(productPath('/dd', 'Demo')).toBe(path.join('/dd', 'Build', 'Products', 'Debug-iphonesimulator', 'Demo.app'));
    expect(productPath('/dd', 'Demo', 'Release')).toBe(path.join('/dd', 'Build', 'Products', 'Release-iphonesimulator', 'Demo.app'));
  });

  it('should keep the last lines of output', () => {
    expect(tailLines('a\nb\nc\n\n', 2)).toBe('b\nc');
    expect(tailLines('one')).toBe('one');
  });
});
