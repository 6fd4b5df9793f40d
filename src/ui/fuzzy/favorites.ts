import { Instance } from '../../types';

/**
 * Instances carrying this tag are listed by `--favorites`.
 */
export const FAVORITE_TAG = { key: 'ssm-ops:favorite', value: 'true' } as const;

export function isFavorite(instance: Instance): boolean {
    return instance.tags[FAVORITE_TAG.key]?.toLowerCase() === FAVORITE_TAG.value;
}

export function onlyFavorites(instances: Instance[]): Instance[] {
    return instances.filter(isFavorite);
}
