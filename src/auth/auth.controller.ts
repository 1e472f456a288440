import { Body, Controller, Get, HttpCode, HttpStatus, Post, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AppRequest, AuthenticatedRequest, requestMeta } from '../common/types/request.types';
import { AuthService, MAGIC_LINK_SENT_MESSAGE } from './auth.service';
import { RefreshTokenDto, RequestMagicLinkDto, VerifyMagicLinkDto } from './dto/auth.dto';
import { JwtAuthGuard } from './jwt-auth.guard';
import { Public } from './public.decorator';

@ApiTags('Auth')
@UseGuards(JwtAuthGuard)
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Public()
  @Post('magic-link')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Request a sign-in link by email' })
  @ApiResponse({ status: 200, description: MAGIC_LINK_SENT_MESSAGE })
  @ApiResponse({ status: 429, description: 'Too many requests for this email' })
  async requestMagicLink(@Body() dto: RequestMagicLinkDto, @Req() req: AppRequest) {
    await this.authService.requestMagicLink(dto.email, requestMeta(req));
    return { success: true, message: MAGIC_LINK_SENT_MESSAGE };
  }

  @Public()
  @Post('verify')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange a magic link for access and refresh tokens' })
  @ApiResponse({ status: 200, description: 'Signed in' })
  @ApiResponse({ status: 401, description: 'Invalid or expired magic link' })
  async verify(@Body() dto: VerifyMagicLinkDto, @Req() req: AppRequest) {
    const data = await this.authService.verifyMagicLink(dto.token, requestMeta(req));
    return { success: true, message: 'Signed in successfully', data };
  }

  @Public()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Rotate the token pair with a refresh token' })
  @ApiResponse({ status: 401, description: 'Invalid refresh token' })
  async refresh(@Body() dto: RefreshTokenDto) {
    const data = await this.authService.refresh(dto.refreshToken);
    return { success: true, message: 'Token refreshed successfully', data };
  }

  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Sign out (tokens are stateless; the client discards them)' })
  async logout(): Promise<void> {
    return;
  }

  @Get('me')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Current user and organization' })
  async me(@Req() req: AuthenticatedRequest) {
    const data = await this.authService.me(req.user.userId);
    return { success: true, message: 'Profile retrieved successfully', data };
  }
}
