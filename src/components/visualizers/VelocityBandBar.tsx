/**
 * VelocityBandBar
 *
 * Common-vent velocity against the recommended band:
 *   Low (condensate pooling) · Recommended · High (noise / erosion)
 */
import type { VelocityBandV1 } from '../../contracts/VentingOutputV1';

interface Props {
  band: VelocityBandV1;
}

/** Bar spans 0 → max × DISPLAY_HEADROOM ft/min. */
const DISPLAY_HEADROOM = 1.25;

const ZONE_STYLE = {
  low:  { label: 'Below band: condensate risk', color: '#c05621' },
  ok:   { label: 'Within recommended band',     color: '#276749' },
  high: { label: 'Above band: noise / erosion', color: '#e53e3e' },
} as const;

export default function VelocityBandBar({ band }: Props) {
  const { velocityFpm, minFpm, maxFpm } = band;
  const displayMax = maxFpm * DISPLAY_HEADROOM;
  const markerPct = (Math.min(velocityFpm, displayMax) / displayMax) * 100;

  const lowWidthPct = (minFpm / displayMax) * 100;
  const okWidthPct = ((maxFpm - minFpm) / displayMax) * 100;
  const highWidthPct = 100 - lowWidthPct - okWidthPct;

  const zone = ZONE_STYLE[band.band];

  return (
    <div style={{ marginBottom: 4 }}>
      <div style={{ position: 'relative', height: 14, borderRadius: 4, display: 'flex' }}>
        <div style={{ width: `${lowWidthPct}%`, background: '#fefcbf', borderRadius: '4px 0 0 4px' }} />
        <div style={{ width: `${okWidthPct}%`, background: '#c6f6d5' }} />
        <div style={{ width: `${highWidthPct}%`, background: '#fed7d7', borderRadius: '0 4px 4px 0' }} />
        <div
          aria-label={`Common vent velocity: ${velocityFpm.toFixed(0)} ft/min`}
          style={{
            position: 'absolute',
            left: `${markerPct}%`,
            top: -3,
            transform: 'translateX(-50%)',
            width: 3,
            height: 20,
            background: zone.color,
            borderRadius: 2,
          }}
        />
      </div>

      <div style={{ position: 'relative', height: 14, fontSize: '0.65rem', color: '#718096' }}>
        <span style={{ position: 'absolute', left: `${lowWidthPct}%`, transform: 'translateX(-50%)' }}>
          {`${minFpm} ft/min`}
        </span>
        <span style={{ position: 'absolute', left: `${lowWidthPct + okWidthPct}%`, transform: 'translateX(-50%)' }}>
          {`${maxFpm} ft/min`}
        </span>
      </div>

      <div style={{ marginTop: 4, fontSize: '0.78rem', color: zone.color, fontWeight: 600 }}>
        {`${velocityFpm.toFixed(0)} ft/min: ${zone.label}`}
      </div>
    </div>
  );
}
