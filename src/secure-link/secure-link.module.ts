import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { SecureLink } from './model/secure-link.model';
import { SecureLinkService } from './secure-link.service';

@Module({
  imports: [SequelizeModule.forFeature([SecureLink])],
  providers: [SecureLinkService],
  exports: [SecureLinkService],
})
export class SecureLinkModule {}
