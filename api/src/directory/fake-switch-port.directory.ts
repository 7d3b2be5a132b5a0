import { Injectable } from '@nestjs/common';
import { SwitchPortDirectory, SwitchPortLookupResult } from './switch-port.directory';

/** Fixed mapping used until a directory endpoint is configured. */
@Injectable()
export class FakeSwitchPortDirectory implements SwitchPortDirectory {
  async lookup(_kennitala: string): Promise<SwitchPortLookupResult> {
    return {
      switchNumber: 'SW001',
      portNumber: 'P001',
      success: true,
      message: 'Success',
    };
  }
}
