import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  const kafkaUri = configService.get<string>('KAFKA_URI', 'disable');
  if (kafkaUri.toLowerCase() !== 'disable') {
    app.connectMicroservice<MicroserviceOptions>(
      {
        transport: Transport.KAFKA,
        options: {
          client: {
            brokers: [kafkaUri],
          },
          consumer: {
            groupId: 'identity-resolver',
          },
        },
      },
      { inheritAppConfig: true },
    );
    await app.startAllMicroservices();
  }

  const port = Number(configService.get<string>('PORT', '3000'));
  app.enableShutdownHooks();
  await app.listen(port, () =>
    new Logger('NestApplication').log(`Started on port ${port}`),
  );
}

bootstrap().catch((err: unknown) => {
  new Logger('NestApplication').error(err);
  process.exit(1);
});
