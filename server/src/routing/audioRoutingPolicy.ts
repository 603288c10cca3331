/**
 * Audio Routing Policy
 *
 * Decides, for every ordered (listener, source) pair in a session, whether the
 * listener hears the source's original stream, a translated replacement, or
 * nothing. Same-language pairs pass the original through; different-language
 * pairs mute the original and replace it with translated speech.
 *
 * The table is rebuilt from the roster on every membership change. Only the
 * `active` flag of a route is ever changed in place.
 */

import type {
  AudioDisposition,
  AudioRoute,
  AudioStreamType,
  LanguageCode,
  ParticipantAudioConfig,
  RoutingInfo,
} from '@parley/shared';

export interface AudioControlSink {
  // False when the listener could not be reached; the control is sent again on the next pass
  setSourceMuted(listenerId: string, sourceId: string, muted: boolean): boolean;
}

function routeKey(sourceId: string, targetId: string, streamType: AudioStreamType): string {
  return `${sourceId}->${targetId}:${streamType}`;
}

function controlKey(listenerId: string, sourceId: string): string {
  return `${listenerId}<-${sourceId}`;
}

export class AudioRoutingPolicy {
  private languages: Map<string, LanguageCode> = new Map();
  private configs: Map<string, ParticipantAudioConfig> = new Map();
  private routes: Map<string, AudioRoute> = new Map();
  private currentSpeaker: string | null = null;
  // Last mute state sent to the sink per (listener, source)
  private appliedControls: Map<string, boolean> = new Map();

  constructor(private readonly sink?: AudioControlSink) {}

  register(participantId: string, language: LanguageCode): void {
    this.languages.set(participantId, language);
    this.rebuild();
    console.log(`[AudioRouting] Registered ${participantId} (${language}), ${this.languages.size} participant(s)`);
  }

  unregister(participantId: string): void {
    if (!this.languages.delete(participantId)) return;

    if (this.currentSpeaker === participantId) {
      this.currentSpeaker = null;
    }
    for (const key of Array.from(this.appliedControls.keys())) {
      const [listenerId, sourceId] = key.split('<-');
      if (listenerId === participantId || sourceId === participantId) {
        this.appliedControls.delete(key);
      }
    }

    this.rebuild();
    console.log(`[AudioRouting] Unregistered ${participantId}`);
  }

  setCurrentSpeaker(participantId: string | null): void {
    if (participantId !== null && !this.languages.has(participantId)) {
      console.warn(`[AudioRouting] Ignoring unknown speaker ${participantId}`);
      return;
    }
    this.currentSpeaker = participantId;
    this.applyControls();
  }

  /**
   * Send every control a listener has not yet acknowledged, e.g. once its
   * transport becomes reachable.
   */
  syncControls(): void {
    this.applyControls();
  }

  getCurrentSpeaker(): string | null {
    return this.currentSpeaker;
  }

  getConfig(participantId: string): ParticipantAudioConfig | undefined {
    const config = this.configs.get(participantId);
    if (!config) return undefined;

    return {
      participantId: config.participantId,
      nativeLanguage: config.nativeLanguage,
      hearOriginal: new Set(config.hearOriginal),
      hearTranslated: new Set(config.hearTranslated),
      mute: new Set(config.mute),
    };
  }

  getRoutes(): AudioRoute[] {
    return Array.from(this.routes.values(), (route) => ({ ...route }));
  }

  /**
   * Pause or resume a route. Returns false if the route does not exist.
   */
  setRouteActive(sourceId: string, targetId: string, streamType: AudioStreamType, active: boolean): boolean {
    const route = this.routes.get(routeKey(sourceId, targetId, streamType));
    if (!route) return false;

    route.active = active;
    if (streamType === 'original') {
      this.applyControls();
    }
    return true;
  }

  /**
   * The one effective decision for a listener and a source.
   * Undefined when either is unknown.
   */
  disposition(listenerId: string, sourceId: string): AudioDisposition | undefined {
    const config = this.configs.get(listenerId);
    if (!config || !this.languages.has(sourceId)) return undefined;
    if (listenerId === sourceId) return 'muted';

    if (config.hearOriginal.has(sourceId)) {
      return this.isRouteActive(sourceId, listenerId, 'original') ? 'original' : 'muted';
    }
    if (config.hearTranslated.has(sourceId)) {
      return this.isRouteActive(sourceId, listenerId, 'translated') ? 'translated' : 'muted';
    }
    return 'muted';
  }

  acceptsTranslatedAudio(sourceId: string, targetId: string): boolean {
    return this.isRouteActive(sourceId, targetId, 'translated');
  }

  getRoutingInfo(): RoutingInfo {
    const participants: RoutingInfo['participants'] = {};
    for (const config of this.configs.values()) {
      participants[config.participantId] = {
        nativeLanguage: config.nativeLanguage,
        hearOriginal: Array.from(config.hearOriginal),
        hearTranslated: Array.from(config.hearTranslated),
        mute: Array.from(config.mute),
      };
    }

    return {
      currentSpeaker: this.currentSpeaker,
      participants,
      routes: this.getRoutes(),
    };
  }

  private isRouteActive(sourceId: string, targetId: string, streamType: AudioStreamType): boolean {
    return this.routes.get(routeKey(sourceId, targetId, streamType))?.active ?? false;
  }

  private rebuild(): void {
    const roster = Array.from(this.languages.entries());
    const configs: Map<string, ParticipantAudioConfig> = new Map();

    for (const [participantId, nativeLanguage] of roster) {
      configs.set(participantId, {
        participantId,
        nativeLanguage,
        hearOriginal: new Set(),
        hearTranslated: new Set(),
        mute: new Set(),
      });
    }

    for (const [listenerId, listenerLanguage] of roster) {
      const config = configs.get(listenerId);
      if (!config) continue;

      for (const [sourceId, sourceLanguage] of roster) {
        if (sourceId === listenerId) continue;

        if (sourceLanguage === listenerLanguage) {
          config.hearOriginal.add(sourceId);
        } else {
          config.hearTranslated.add(sourceId);
          config.mute.add(sourceId);
        }
      }
    }

    // Preserve paused routes across rebuilds
    const previous = this.routes;
    const routes: Map<string, AudioRoute> = new Map();

    for (const config of configs.values()) {
      const addRoute = (sourceId: string, streamType: AudioStreamType) => {
        const sourceLanguage = this.languages.get(sourceId);
        if (!sourceLanguage) return;

        const key = routeKey(sourceId, config.participantId, streamType);
        routes.set(key, {
          sourceId,
          targetId: config.participantId,
          sourceLanguage,
          targetLanguage: config.nativeLanguage,
          streamType,
          active: previous.get(key)?.active ?? true,
        });
      };

      config.hearOriginal.forEach((sourceId) => addRoute(sourceId, 'original'));
      config.hearTranslated.forEach((sourceId) => addRoute(sourceId, 'translated'));
    }

    this.configs = configs;
    this.routes = routes;
    this.applyControls();
  }

  // The raw stream of S is audible to L only while S speaks and L hears S in the original
  private applyControls(): void {
    for (const listenerId of this.languages.keys()) {
      for (const sourceId of this.languages.keys()) {
        if (sourceId === listenerId) continue;

        const muted = !(
          sourceId === this.currentSpeaker && this.disposition(listenerId, sourceId) === 'original'
        );
        const key = controlKey(listenerId, sourceId);
        if (this.appliedControls.get(key) === muted) continue;

        const delivered = this.sink ? this.sink.setSourceMuted(listenerId, sourceId, muted) : true;
        if (delivered) {
          this.appliedControls.set(key, muted);
        }
      }
    }
  }
}
