import { LoginStatus } from './session.service';

export class LoginDto {
    username?: string;
    password?: string;
    mfa_code?: string;
}

export interface LoginResponse {
    status: LoginStatus;
    message: string;
}

export interface CheckLoginResponse {
    authenticated: boolean;
}
