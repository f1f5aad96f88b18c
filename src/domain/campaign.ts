import type { UserRecord } from './entities.js';

/**
 * Settings of a banner campaign at one point in time.
 */
export interface CampaignSettings {
  /** Wiki timestamps. */
  readonly start: string;
  readonly end: string;
  readonly enabled: boolean;
  readonly archived: boolean;
  readonly banners: readonly string[];
}

interface CampaignChangeBase {
  readonly campaignName: string;
  readonly performer: UserRecord;
  readonly summary: string | null;
  readonly timestamp: string;
  readonly campaignUrl: string;
}

export interface CampaignCreated extends CampaignChangeBase {
  readonly kind: 'created';
  readonly settings: CampaignSettings | null;
}

export interface CampaignModified extends CampaignChangeBase {
  readonly kind: 'modified';
  readonly settings: CampaignSettings | null;
  readonly priorSettings: CampaignSettings;
}

export interface CampaignRemoved extends CampaignChangeBase {
  readonly kind: 'removed';
  readonly priorSettings: CampaignSettings;
}

export type CampaignChange = CampaignCreated | CampaignModified | CampaignRemoved;

export type CampaignChangeKind = CampaignChange['kind'];
