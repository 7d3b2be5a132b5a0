import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FakeSwitchPortDirectory } from './fake-switch-port.directory';
import { HttpSwitchPortDirectory } from './http-switch-port.directory';
import { SWITCH_PORT_DIRECTORY, SwitchPortDirectoryMode } from './switch-port.directory';

const logger = new Logger('DirectoryModule');

export function resolveDirectoryMode(raw: string | undefined): SwitchPortDirectoryMode {
  const mode = (raw ?? '').trim().toLowerCase();
  if (mode === 'http') return 'http';
  if (mode !== '' && mode !== 'fake') {
    logger.warn(`DIRECTORY_MODE=${raw} is not one of fake, http; using the fake directory`);
  }
  return 'fake';
}

@Module({
  providers: [
    FakeSwitchPortDirectory,
    HttpSwitchPortDirectory,
    {
      provide: SWITCH_PORT_DIRECTORY,
      inject: [ConfigService, FakeSwitchPortDirectory, HttpSwitchPortDirectory],
      useFactory: (
        config: ConfigService,
        fakeDirectory: FakeSwitchPortDirectory,
        httpDirectory: HttpSwitchPortDirectory,
      ) => {
        const mode = resolveDirectoryMode(config.get<string>('DIRECTORY_MODE'));
        return mode === 'http' ? httpDirectory : fakeDirectory;
      },
    },
  ],
  exports: [SWITCH_PORT_DIRECTORY],
})
export class DirectoryModule {}
