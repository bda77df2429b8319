import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { HospitalsModule } from '../hospitals/hospitals.module';

@Module({
  imports: [ConfigModule, HospitalsModule],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
})
export class HomeModule {}
