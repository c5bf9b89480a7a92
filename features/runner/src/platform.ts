/**
 * @opsdeck/runner - Platforms
 * Wrap the bootstrap command into the command line actually spawned.
 */

import { UserMessageError, shellEscape, type PlatformName } from '@opsdeck/shared';

export interface Platform {
  readonly name: PlatformName;
  wrap(command: string): string;
}

export class LocalPlatform implements Platform {
  readonly name = 'local';

  wrap(command: string): string {
    return command;
  }
}

export class HerokuPlatform implements Platform {
  readonly name = 'heroku';

  constructor(
    readonly appName: string,
    private readonly binary: string = 'heroku',
  ) {}

  wrap(command: string): string {
    return `CI=true ${this.binary} run --exit-code --app ${shellEscape(this.appName)} -- ${shellEscape(command)}`;
  }
}

/**
 * Runs through `opsdeck eb run`, which takes the remaining words as the
 * command, so the bootstrap command is passed unescaped.
 */
export class ElasticBeanstalkPlatform implements Platform {
  readonly name = 'eb';

  constructor(
    readonly appName: string,
    private readonly binary: string = 'opsdeck',
  ) {}

  wrap(command: string): string {
    return `${this.binary} eb run --app ${shellEscape(this.appName)} -- ${command}`;
  }
}

export interface PlatformOptions {
  appName?: string;
  herokuBinary?: string;
  ebRunBinary?: string;
}

export function createPlatform(name: PlatformName, options: PlatformOptions = {}): Platform {
  if (name === 'local') return new LocalPlatform();

  if (!options.appName) {
    throw new UserMessageError(`Platform "${name}" requires an application name`);
  }

  return name === 'heroku'
    ? new HerokuPlatform(options.appName, options.herokuBinary)
    : new ElasticBeanstalkPlatform(options.appName, options.ebRunBinary);
}
