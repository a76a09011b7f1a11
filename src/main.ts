import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import * as dotenv from 'dotenv';
import { AppModule } from './app.module';
import { IKeySource } from './keys/key-source.interface';
import { DelegationStoreService } from './delegation/delegation-store.service';

/**
 * 로드된 키 / 위임 요약을 남기고 컨텍스트 종료
 *
 * 종료 시 onApplicationShutdown 훅 실행 (원격 서명자 연결, LevelDB 닫기)
 */
export async function runAgent(app: INestApplicationContext): Promise<string> {
  const logger = new Logger('Bootstrap');

  try {
    const keySource = app.get(IKeySource);
    const publicKeys = await keySource.publicKeys();
    const store = app.get(DelegationStoreService);

    const summary = `Delegation agent ready: ${publicKeys.length} signing keys (${keySource.kind}), ${store.size()} active delegations`;
    logger.log(summary);
    return summary;
  } finally {
    await app.close();
  }
}

async function bootstrap() {
  dotenv.config();

  // HTTP 서버 없이 DI 컨테이너만 시작
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  await runAgent(app);
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    new Logger('Bootstrap').error(
      error instanceof Error ? error.message : String(error),
    );
    process.exit(1);
  });
}
