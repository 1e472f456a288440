import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { INestApplication } from '@nestjs/common';

export function setupSwagger(app: INestApplication, swaggerPath: string = '/api/docs') {
  const config = new DocumentBuilder()
    .setTitle('Supplier Compliance API')
    .setDescription('Supplier invitations, compliance requirements, questionnaires and reviews')
    .setVersion('1.0')
    .addBearerAuth()
    .build();

  const document = SwaggerModule.createDocument(app, config);

  SwaggerModule.setup(swaggerPath.replace(/^\//, ''), app, document, {
    swaggerOptions: {
      tagsSorter: 'alpha',
      operationsSorter: 'alpha',
    },
  });
}
