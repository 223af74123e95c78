import { useQuery } from '@tanstack/react-query';
import { Outlet } from 'react-router';
import { api } from '../lib/api.js';
import { queryKeys } from '../lib/queryKeys.js';
import styles from './Layout.module.css';

export default function Layout() {
  const configQuery = useQuery({
    queryKey: queryKeys.config,
    queryFn: api.getConfig,
    staleTime: Infinity,
  });

  const healthQuery = useQuery({
    queryKey: queryKeys.health,
    queryFn: api.getHealth,
    refetchInterval: 15000,
  });

  const config = configQuery.data;

  return (
    <div className={styles.container}>
      <aside className={styles.sidebar}>
        <div className={styles.header}>
          <h1 className={styles.title}>chat-relay</h1>
          <div className={styles.status}>
            Relay:{' '}
            {healthQuery.isSuccess ? (
              <span className={styles.statusUp}>up</span>
            ) : (
              <span className={styles.statusDown}>{healthQuery.isPending ? 'checking' : 'unreachable'}</span>
            )}
          </div>
        </div>

        <section className={styles.settings}>
          <h2 className={styles.settingsTitle}>Model settings</h2>
          {configQuery.isError && <div className={styles.settingsError}>Failed to load settings</div>}
          {config && (
            <dl className={styles.settingsList}>
              <dt>Model</dt>
              <dd>{config.model}</dd>
              <dt>Endpoint</dt>
              <dd>{config.baseUrl}</dd>
              <dt>Max tokens</dt>
              <dd>{config.maxTokens}</dd>
              <dt>Temperature</dt>
              <dd>{config.temperature}</dd>
              <dt>Top-p</dt>
              <dd>{config.topP ?? '(endpoint default)'}</dd>
              <dt>Context window</dt>
              <dd>{config.contextWindowTokens} tokens</dd>
              <dt>System prompt</dt>
              <dd>{config.hasSystemPrompt ? 'set' : 'none'}</dd>
            </dl>
          )}
        </section>
      </aside>

      <main className={styles.main}>
        <Outlet />
      </main>
    </div>
  );
}
