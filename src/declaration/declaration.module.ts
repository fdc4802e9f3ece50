import { Module } from '@nestjs/common';
import { DeclarationService } from './declaration.service';

@Module({
  providers: [DeclarationService],
  exports: [DeclarationService],
})
export class DeclarationModule {}
