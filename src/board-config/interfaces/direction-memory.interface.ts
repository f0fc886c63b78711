import { RegisterHalf } from '../../register/register-model';

export const DIRECTION_MEMORY = 'DIRECTION_MEMORY';

export interface BoardDirections {
  boardAddress: number;
  directionA: number;
  directionB: number;
}

/** Last known direction registers of every board, kept across restarts. */
export interface DirectionMemory {
  remember(boardAddress: number, half: RegisterHalf, value: number): Promise<void>;
  forget(boardAddress: number): Promise<void>;
  list(): Promise<BoardDirections[]>;
}
