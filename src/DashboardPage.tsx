/**
 * Page root: query client plus the operations dashboard for the selected page.
 */
import React from 'react';
import { QueryClient, QueryClientProvider } from '@tanstack/react-query';
import { OpsDashboard } from './components/OpsDashboard';
import type { PageSelection } from './config';
import { DASHBOARD_PAGES } from './engine/chartBinding';

const queryClient = new QueryClient({
  defaultOptions: { queries: { staleTime: Infinity, refetchOnWindowFocus: false } },
});

export interface DashboardPageProps {
  selection?: PageSelection;
}

const DashboardPage: React.FC<DashboardPageProps> = ({ selection = { page: 'overview' } }) => {
  const { title, panels } = DASHBOARD_PAGES[selection.page];
  return (
    <QueryClientProvider client={queryClient}>
      <OpsDashboard
        title={selection.location ? `${title} · ${selection.location}` : title}
        panels={panels}
        location={selection.location}
      />
    </QueryClientProvider>
  );
};

export default DashboardPage;
