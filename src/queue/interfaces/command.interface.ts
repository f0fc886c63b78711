export enum CommandVerb {
  IDENTIFY = 'IDENTIFY',
  GETDBIT = 'GETDBIT',
  GETDIRREG = 'GETDIRREG',
  GETIOREG = 'GETIOREG',
  SETDBIT = 'SETDBIT',
  CLRDBIT = 'CLRDBIT',
  GETPIN = 'GETPIN',
  SETPIN = 'SETPIN',
  CLRPIN = 'CLRPIN',
  TOGGLE = 'TOGGLE',
}

export const REGISTER_VERBS: ReadonlySet<CommandVerb> = new Set([
  CommandVerb.GETDIRREG,
  CommandVerb.GETIOREG,
]);

export const READ_VERBS: ReadonlySet<CommandVerb> = new Set([
  CommandVerb.GETDBIT,
  CommandVerb.GETDIRREG,
  CommandVerb.GETIOREG,
  CommandVerb.GETPIN,
]);

export function isCommandVerb(value: string): value is CommandVerb {
  return Object.values<string>(CommandVerb).includes(value);
}

export interface CommandRequest {
  verb: CommandVerb;
  boardAddress: number;
  pinIndex?: number;
  registerHalf?: number;
}

export interface Command extends CommandRequest {
  token: string;
  submittedAt: number;
}
