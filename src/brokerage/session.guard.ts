import { CanActivate, Injectable, UnauthorizedException } from '@nestjs/common';
import { SessionService } from './session.service';

@Injectable()
export class SessionGuard implements CanActivate {
    constructor(private readonly sessionService: SessionService) { }

    canActivate(): boolean {
        if (!this.sessionService.isAuthenticated()) {
            throw new UnauthorizedException('Not logged in. Please login again.');
        }
        return true;
    }
}
