import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import { HospitalsModule } from './hospitals/hospitals.module';
import { HomeModule } from './home/home.module';
import { HttpsEnforcementMiddleware } from './utils/https-enforcement.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
      envFilePath: ['.env'],
    }),
    HospitalsModule,
    HomeModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(HttpsEnforcementMiddleware).forRoutes('*');
  }
}
