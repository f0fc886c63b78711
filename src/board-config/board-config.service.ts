import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { RegisterHalf } from '../register/register-model';
import { BoardConfig } from './board-config.schema';
import {
  BoardDirections,
  DirectionMemory,
} from './interfaces/direction-memory.interface';

@Injectable()
export class BoardConfigService implements DirectionMemory {
  constructor(
    @InjectModel(BoardConfig.name)
    private readonly boardConfigModel: Model<BoardConfig>,
  ) {}

  async remember(
    boardAddress: number,
    half: RegisterHalf,
    value: number,
  ): Promise<void> {
    const field = half === 0 ? 'directionA' : 'directionB';
    await this.boardConfigModel.updateOne(
      { boardAddress },
      { $set: { [field]: value } },
      { upsert: true },
    );
  }

  async forget(boardAddress: number): Promise<void> {
    await this.boardConfigModel.deleteOne({ boardAddress });
  }

  async list(): Promise<BoardDirections[]> {
    const boards = await this.boardConfigModel.find().lean().exec();

    return boards.map(({ boardAddress, directionA, directionB }) => ({
      boardAddress,
      directionA,
      directionB,
    }));
  }
}
