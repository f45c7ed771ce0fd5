import { Module } from '@nestjs/common';
import { StickListModule } from './stick-list/stick-list.module';

@Module({
  imports: [StickListModule],
})
export class AppModule {}
