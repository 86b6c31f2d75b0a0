/**
 * HTML Report Renderer
 *
 * Email-safe HTML (inline styles, no scripts) for one scan: a filter summary,
 * best fare per cabin, then one table per departure month.
 */

import { format, parseISO } from 'date-fns';
import { AIRPORT_NAMES, CABIN_LABELS } from '../config/constants';
import { effectiveCarrier } from '../fares/eligibility';
import type { Cabin, EligibleOffer, IsoDate, MonthBucket, ScanRequest } from '../fares/types';
import type { ScanReport } from '../scan/runner';

export interface RenderOptions {
  /** Heading text; defaults to "Fare Watch" */
  title?: string;
}

const FONT = 'Arial,Helvetica,sans-serif';
const GREEN = '#16a34a';
const AMBER = '#f59e0b';
/** Share of the cap at or below which a price is highlighted green. */
const GOOD_DEAL_RATIO = 0.8;

export function esc(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** dd/mm/yy */
export function formatShortDate(date: IsoDate): string {
  return format(parseISO(date), 'dd/MM/yy');
}

/** Whole units with thousands separators: "NZD 1,299". */
export function formatMoney(amount: number, currency: string): string {
  const whole = String(Math.round(amount)).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${currency} ${whole}`;
}

export function airportLabel(code: string): string {
  const name = AIRPORT_NAMES[code];
  return name ? `${name} (${code})` : code;
}

export function priceColour(price: number, cap: number): string {
  return price <= cap * GOOD_DEAL_RATIO ? GREEN : AMBER;
}

/**
 * "<routes> <cabins> fares – <dd/mm/yy>"
 */
export function buildSubject(request: ScanRequest): string {
  const routes = request.routes.map((r) => `${r.origin}→${r.destination}`).join('/');
  const cabins = request.cabins.map((c) => CABIN_LABELS[c]).join(' & ');
  return `${routes} ${cabins} fares – ${formatShortDate(request.today)}`;
}

// ============ Fragments ============

function th(text: string): string {
  return `<th style="text-align:left;padding:8px 10px;border-bottom:2px solid #e5e7eb;background:#f9fafb">${esc(text)}</th>`;
}

function td(html: string): string {
  return `<td style="padding:6px 10px;border-bottom:1px solid #eee">${html}</td>`;
}

function pill(text: string, background: string): string {
  return `<span style="background:${background};color:#111;padding:4px 8px;border-radius:999px;font-size:12px;margin-right:6px">${esc(text)}</span>`;
}

function filterSummary(request: ScanRequest): string {
  const caps = request.cabins.map(
    (cabin) => `${CABIN_LABELS[cabin]} ≤ ${formatMoney(request.priceCaps[cabin], request.currency)}`
  );
  const parts = [
    `${request.requiredAirline} operated`,
    ...caps,
    `Return ${request.stay.minNights}–${request.stay.maxNights} nights`,
    `±${request.flexDays} days flex`,
  ];
  return `<p style="font-family:${FONT};margin:6px 0">Filters: ${esc(parts.join(' • '))}</p>`;
}

function bestFares(offers: readonly EligibleOffer[], request: ScanRequest): string {
  const pills = request.cabins.map((cabin: Cabin) => {
    const best = offers.find((o) => o.cabin === cabin);
    const text = `${CABIN_LABELS[cabin]} best: ${best ? formatMoney(best.price, best.currency) : '—'}`;
    return pill(text, cabin === 'Business' ? '#fde68a' : '#86efac');
  });
  return `<p>${pills.join(' ')}</p>`;
}

function offerRow(offer: EligibleOffer, request: ScanRequest): string {
  const route = `${airportLabel(offer.origin)} → ${airportLabel(offer.destination)}`;
  const dates = `${formatShortDate(offer.departureDate)} → ${formatShortDate(offer.returnDate)}`;
  const colour = priceColour(offer.price, request.priceCaps[offer.cabin]);
  const price = `<span style="color:${colour};font-weight:600">${esc(formatMoney(offer.price, offer.currency))}</span>`;
  return (
    '<tr>' +
    td(esc(route)) +
    td(esc(dates)) +
    td(esc(CABIN_LABELS[offer.cabin])) +
    td(price) +
    td(esc(effectiveCarrier(offer) ?? '—')) +
    td(`<a href="${esc(offer.bookingLink)}">Book / Check</a>`) +
    '</tr>'
  );
}

function monthSection(bucket: MonthBucket, request: ScanRequest): string {
  const header = '<tr>' + [th('Route'), th('Depart → Return'), th('Cabin'), th('Price'), th('Carrier'), th('Link')].join('') + '</tr>';
  const rows = bucket.offers.map((offer) => offerRow(offer, request));
  return [
    `<h2 style="font-family:${FONT};margin:18px 0 8px 0">${esc(bucket.label)}</h2>`,
    `<table style="border-collapse:collapse;font-family:${FONT};font-size:14px;width:100%;max-width:1000px">`,
    header,
    ...rows,
    '</table>',
  ].join('\n');
}

// ============ Report ============

export function renderHtmlReport(report: ScanReport, request: ScanRequest, options: RenderOptions = {}): string {
  const title = options.title ?? 'Fare Watch';
  const { window } = report.resultSet;
  const routes = request.routes.map((r) => `${r.origin} → ${r.destination}`).join(', ');

  const parts = [
    `<h1 style="font-family:${FONT}">${esc(title)} – ${esc(routes)}</h1>`,
    filterSummary(request),
    `<p style="font-family:${FONT};margin:6px 0">Departures ${formatShortDate(window.start)} – ${formatShortDate(window.end)}</p>`,
  ];

  if (report.status === 'aborted') {
    const reason = report.fatal ? report.fatal.message : 'unknown error';
    parts.push(`<p style="font-family:${FONT};color:#b91c1c">Scan aborted: ${esc(reason)}</p>`);
  }

  if (report.resultSet.offers.length === 0) {
    parts.push(`<p style="font-family:${FONT}">No qualifying fares found.</p>`);
    return parts.join('\n');
  }

  parts.push(bestFares(report.resultSet.offers, request));
  for (const bucket of report.buckets) {
    parts.push(monthSection(bucket, request));
  }
  return parts.join('\n');
}
