import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export function configureApp(app: INestApplication): void {
  const frontendUrl = app.get(ConfigService).get<string>('FRONTEND_URL');

  app.setGlobalPrefix('api');
  app.enableCors({
    origin: [
      'http://localhost:3000',
      'http://localhost:5173',
      frontendUrl ?? '',
    ].filter(Boolean),
    methods: 'GET,HEAD,POST',
    credentials: true,
  });
}
