import type { UserProfile, UserType } from '../modules/users/domain/models/user-profile.model';
import type {
  IUserProfilesRepository,
  ProfileActivity,
} from '../modules/users/domain/ports/user-profiles.port';

export class InMemoryUserProfilesRepository implements IUserProfilesRepository {
  readonly profiles = new Map<string, UserProfile>();

  async findById(id: string): Promise<UserProfile | null> {
    const profile = this.profiles.get(id);
    return profile ? { ...profile } : null;
  }

  async ensureProfile(id: string, userType: UserType): Promise<void> {
    if (!this.profiles.has(id)) {
      this.profiles.set(id, { id, userType, isDevicePaired: false });
    }
  }

  async recordActivity(activity: ProfileActivity): Promise<boolean> {
    const current = this.profiles.get(activity.userId) ?? {
      id: activity.userId,
      userType: 'child',
      isDevicePaired: false,
    };
    if (current.lastActiveAt && current.lastActiveAt.getTime() > activity.at.getTime()) {
      return false;
    }
    this.profiles.set(activity.userId, {
      ...current,
      lastActiveAt: activity.at,
      lastActivityType: activity.activityType,
      deviceInfo: activity.deviceInfo ?? current.deviceInfo,
    });
    return true;
  }

  async findInactiveChildren(before: Date): Promise<UserProfile[]> {
    return [...this.profiles.values()]
      .filter(
        (profile) =>
          profile.userType === 'child' &&
          profile.lastActiveAt !== undefined &&
          profile.lastActiveAt.getTime() < before.getTime(),
      )
      .map((profile) => ({ ...profile }));
  }
}
