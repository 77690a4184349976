import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SizeMappingService } from './size-mapping.service';

@Module({
    imports: [ConfigModule],
    providers: [SizeMappingService],
    exports: [SizeMappingService],
})
export class SizeMappingModule {}
