import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './config/env.validation';
import { SyncEngineModule } from './sync-engine/sync-engine.module';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            envFilePath: '.env',
            validate: validateEnvironment,
        }),
        SyncEngineModule,
    ],
})
export class AppModule {}
