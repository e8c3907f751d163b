import type { PipelineFailure } from '../lib/pipeline-result.js';
import type { Profile } from '../profiles/profile.js';
import type { CertificateConfig } from '../profiles/snapshot.js';

export type ManagerEvent =
  | { type: 'profiles_updated'; profiles: Profile[] }
  | { type: 'profile_updated'; profile: Profile }
  | { type: 'upload_error'; id: string | null; error: PipelineFailure }
  | { type: 'extract_error'; id: string; error: PipelineFailure }
  | { type: 'certificate_error'; id: string; error: PipelineFailure }
  | { type: 'inference_url_updated'; url: string | null }
  | { type: 'certificate_config_updated'; config: CertificateConfig };

export type Subscriber = (event: ManagerEvent) => void;
