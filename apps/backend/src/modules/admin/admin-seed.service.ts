import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Role } from '../../common/enums/role.enum';
import { UsersService } from '../users/users.service';

/**
 * Creates the first administrator from ADMIN_EMAIL / ADMIN_PASSWORD when no
 * administrator exists yet. Does nothing on later boots.
 */
@Injectable()
export class AdminSeedService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AdminSeedService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.seed();
  }

  async seed(): Promise<boolean> {
    const email = this.configService.get<string>('seed.adminEmail');
    const password = this.configService.get<string>('seed.adminPassword');
    if (!email || !password) {
      this.logger.debug('ADMIN_EMAIL/ADMIN_PASSWORD not set, skipping seed');
      return false;
    }

    if (await this.usersService.hasAdministrator()) {
      return false;
    }

    const user = await this.usersService.createAccount(
      {
        username: this.configService.get<string>(
          'seed.adminUsername',
          'administrator',
        ),
        fullName: 'Administrator',
        email: email.toLowerCase(),
        password,
      },
      Role.ADMIN,
    );

    this.logger.log(`Initial administrator created: ${user.email}`);
    return true;
  }
}
