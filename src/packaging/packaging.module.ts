import { Module } from '@nestjs/common';
import { DEPENDENCY_INSTALLER, NpmDependencyInstaller } from './dependency-installer';
import { PackagerService } from './packager.service';

@Module({
  providers: [
    {
      provide: DEPENDENCY_INSTALLER,
      useFactory: () => new NpmDependencyInstaller(),
    },
    PackagerService,
  ],
  exports: [PackagerService],
})
export class PackagingModule {}
