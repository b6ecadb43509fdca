// In-process stand-in for the PostgREST endpoint behind supabase-js.
// Handles what the stores send: select with eq filters, order and limit,
// upsert (POST) and update (PATCH). Pass `fetch` to createSupabase.

export type Row = Record<string, unknown>;

function isRow(v: unknown): v is Row {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

const CONTROL_PARAMS = new Set(['select', 'order', 'limit', 'offset', 'on_conflict', 'columns']);

export class FakePostgrest {
  readonly tables = new Map<string, Row[]>();
  readonly requests: Array<{ method: string; table: string; search: string }> = [];
  failNext?: { status: number; message: string };

  rows(table: string): Row[] {
    let rows = this.tables.get(table);
    if (!rows) this.tables.set(table, (rows = []));
    return rows;
  }

  readonly fetch = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const method = (init?.method ?? 'GET').toUpperCase();
    const table = url.pathname.replace(/^\/rest\/v1\//, '');
    this.requests.push({ method, table, search: url.search });

    if (this.failNext) {
      const { status, message } = this.failNext;
      this.failNext = undefined;
      return new Response(JSON.stringify({ message, code: 'XX000', details: null, hint: null }), {
        status,
        headers: { 'Content-Type': 'application/json' },
      });
    }

    const rows = this.rows(table);
    const matches = (r: Row) => {
      let ok = true;
      url.searchParams.forEach((v, k) => {
        if (CONTROL_PARAMS.has(k) || !v.startsWith('eq.')) return;
        if (String(r[k]) !== v.slice(3)) ok = false;
      });
      return ok;
    };
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;

    switch (method) {
      case 'GET': {
        let out = rows.filter(matches);
        const order = url.searchParams.get('order');
        if (order) {
          const [col, dir] = order.split('.');
          const sign = dir === 'desc' ? -1 : 1;
          out = [...out].sort((a, b) => sign * String(a[col]).localeCompare(String(b[col])));
        }
        const limit = url.searchParams.get('limit');
        if (limit) out = out.slice(0, Number(limit));
        return new Response(JSON.stringify(out), { status: 200, headers: { 'Content-Type': 'application/json' } });
      }
      case 'POST': {
        const incoming = (Array.isArray(body) ? body : [body]).filter(isRow);
        for (const row of incoming) {
          const i = rows.findIndex(r => r.id === row.id);
          if (i >= 0) rows[i] = { ...row };
          else rows.push({ ...row });
        }
        return new Response(null, { status: 201 });
      }
      case 'PATCH': {
        if (isRow(body)) {
          rows.forEach((r, i) => { if (matches(r)) rows[i] = { ...r, ...body }; });
        }
        return new Response(null, { status: 204 });
      }
      default:
        return new Response(JSON.stringify({ message: `unsupported method ${method}` }), { status: 405 });
    }
  };
}
