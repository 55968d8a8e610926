import type { AdSource } from '../types.js';
import { byteLength } from '../utils/text.js';
import { findMarker } from './markers.js';

interface LoginWallRule {
  loginPrompts: string[];
  contentMarkers: string[];
  minContentBytes: number;
}

export type LoginWallReason = 'login-prompt' | 'thin-page' | 'content-present' | 'no-prompt' | 'no-rule';

export interface LoginWallVerdict {
  detected: boolean;
  reason: LoginWallReason;
  signal?: string;
}

const LOGIN_WALL_RULES: Partial<Record<AdSource, LoginWallRule>> = {
  linkedin: {
    loginPrompts: [
      'sign in to linkedin',
      'join linkedin',
      'sign in to view',
      'sign in to see',
      'join now to see',
      'authwall',
      'join to view',
    ],
    contentMarkers: [
      'about the job',
      'show-more-less-html',
      'description__text',
      'jobs-description',
      'job-details',
      'meet the hiring team',
      'job description',
      'responsibilities',
      'qualifications',
    ],
    minContentBytes: 15000,
  },
};

export function hasLoginWallRule(site: AdSource): boolean {
  return LOGIN_WALL_RULES[site] !== undefined;
}

export function detectLoginWall(html: string, site: AdSource): LoginWallVerdict {
  const rule = LOGIN_WALL_RULES[site];
  if (!rule) {
    return { detected: false, reason: 'no-rule' };
  }

  const lower = html.toLowerCase();
  const contentMarker = findMarker(lower, rule.contentMarkers);
  if (contentMarker) {
    return { detected: false, reason: 'content-present', signal: contentMarker };
  }

  const loginPrompt = findMarker(lower, rule.loginPrompts);
  if (loginPrompt) {
    return { detected: true, reason: 'login-prompt', signal: loginPrompt };
  }

  if (byteLength(html) < rule.minContentBytes) {
    return { detected: true, reason: 'thin-page' };
  }

  return { detected: false, reason: 'no-prompt' };
}
