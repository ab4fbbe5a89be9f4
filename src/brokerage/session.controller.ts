import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { CheckLoginResponse, LoginDto, LoginResponse } from './dto';
import { LoginStatus, SessionService } from './session.service';

const LOGIN_RESPONSES: Record<LoginStatus, { httpStatus: HttpStatus; message: string }> = {
    [LoginStatus.Authenticated]: {
        httpStatus: HttpStatus.OK,
        message: 'Login successful',
    },
    [LoginStatus.DeviceApprovalRequired]: {
        httpStatus: HttpStatus.ACCEPTED,
        message: 'Please approve this device in your brokerage app, then check login again.',
    },
    [LoginStatus.InvalidCredentials]: {
        httpStatus: HttpStatus.UNAUTHORIZED,
        message: 'Login failed: invalid username or password',
    },
};

function text(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

@Controller()
export class SessionController {
    constructor(
        private readonly sessionService: SessionService,
        private readonly configService: ConfigService,
    ) { }

    @Post('login')
    async login(
        @Body() body: LoginDto | undefined,
        @Res({ passthrough: true }) res: Response,
    ): Promise<LoginResponse> {
        const username = text(body?.username) ?? this.configService.get<string>('BROKERAGE_USERNAME');
        const password = text(body?.password) ?? this.configService.get<string>('BROKERAGE_PASSWORD');
        if (!username || !password) {
            throw new BadRequestException('Username and password are required');
        }

        const status = await this.sessionService.login({
            username,
            password,
            mfaCode: text(body?.mfa_code),
        });
        const { httpStatus, message } = LOGIN_RESPONSES[status];
        res.status(httpStatus);
        return { status, message };
    }

    @Post('logout')
    @HttpCode(HttpStatus.OK)
    async logout(): Promise<{ success: true }> {
        await this.sessionService.logout();
        return { success: true };
    }

    @Get('check-login')
    async checkLogin(): Promise<CheckLoginResponse> {
        return { authenticated: await this.sessionService.checkLogin() };
    }
}
