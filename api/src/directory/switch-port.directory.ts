export type SwitchPortLookupResult = {
  switchNumber: string;
  portNumber: string;
  success: boolean;
  message: string;
};

export interface SwitchPortDirectory {
  lookup(kennitala: string): Promise<SwitchPortLookupResult>;
}

export type SwitchPortDirectoryMode = 'fake' | 'http';

export const SWITCH_PORT_DIRECTORY = Symbol('SWITCH_PORT_DIRECTORY');
