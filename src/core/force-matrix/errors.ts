/**
 * 프로필 설정 오류
 * 프로필 레코드가 구조적으로 잘못된 경우 생성 전체를 중단
 */
export class ProfileConfigError extends Error {
  readonly profileId: string;

  constructor(profileId: string, message: string) {
    super(`profile "${profileId}": ${message}`);
    this.name = 'ProfileConfigError';
    this.profileId = profileId;
  }
}
