import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { STAKING_CONFIG, StakingConfig } from './config/staking.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  // DTO 검증 파이프 전역 설정
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // DTO에 없는 속성 제거
      forbidNonWhitelisted: true, // DTO에 없는 속성 있으면 에러
      transform: true, // 자동 타입 변환
    }),
  );

  // Swagger 설정
  const swagger = new DocumentBuilder()
    .setTitle('Staking Consensus API')
    .setDescription('지분 가중 오프체인 서명 합의 엔진 API 문서')
    .setVersion('1.0')
    .addTag('stake', '스테이크 관리 API')
    .addTag('identity', 'BLS 주소 / 대리 서명자 API')
    .addTag('consensus', '투표 제출과 토픽 조회 API')
    .build();

  const document = SwaggerModule.createDocument(app, swagger);
  SwaggerModule.setup('api', app, document);

  const config = app.get<StakingConfig>(STAKING_CONFIG);
  await app.listen(config.port);
  logger.log(`Application is running on: http://localhost:${config.port}`);
  logger.log(`Swagger UI: http://localhost:${config.port}/api`);
  logger.log(`Engine ${config.engineAddress}, chain ${config.domain.chainId}`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  new Logger('Bootstrap').error(message);
  process.exit(1);
});
