import { Global, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { BoardConfig, BoardConfigSchema } from './board-config.schema';
import { BoardConfigService } from './board-config.service';
import { DIRECTION_MEMORY } from './interfaces/direction-memory.interface';

/** Loaded only when MONGO_URI is set; the dispatcher runs without it. */
@Global()
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: BoardConfig.name, schema: BoardConfigSchema },
    ]),
  ],
  providers: [
    BoardConfigService,
    { provide: DIRECTION_MEMORY, useExisting: BoardConfigService },
  ],
  exports: [DIRECTION_MEMORY],
})
export class BoardConfigModule {}
