import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { resolve } from 'node:path';
import portfolioConfig from '../config/portfolio.config';
import { FileKeyValueStore } from './file-key-value.store';
import { KEY_VALUE_STORE } from './key-value-store.interface';

@Module({
  providers: [
    {
      provide: KEY_VALUE_STORE,
      inject: [portfolioConfig.KEY],
      useFactory: (config: ConfigType<typeof portfolioConfig>) =>
        new FileKeyValueStore(resolve(config.stateFile)),
    },
  ],
  exports: [KEY_VALUE_STORE],
})
export class StorageModule {}
