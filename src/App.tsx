import { useEffect } from 'react'
import { DashboardLayout } from './components/layout/DashboardLayout'
import { FavoritesBar } from './components/favorites/FavoritesBar'
import { ServiceGrid } from './components/services/ServiceGrid'
import { ResourceMonitor } from './components/system/ResourceMonitor'
import { DiskList } from './components/system/DiskList'
import { ContainerUsageList } from './components/system/ContainerUsageList'
import { SettingsPanel } from './components/settings/SettingsPanel'
import { ToastContainer } from './components/ui/Toast'
import { useUiSettings } from './api/hooks/useSettings'
import { getSocket } from './api/socket'
import { useTheme } from './hooks/useTheme'
import { useDashboardStore } from './stores/dashboardStore'

function Dashboard() {
  return (
    <div className="flex flex-col lg:flex-row gap-4">
      <div className="flex-1 min-w-0 space-y-4">
        <FavoritesBar />
        <ServiceGrid />
        <ContainerUsageList />
      </div>
      <aside className="lg:w-80 space-y-4">
        <ResourceMonitor />
        <DiskList />
      </aside>
    </div>
  )
}

function App() {
  const view = useDashboardStore((state) => state.view)
  const { data: uiSettings } = useUiSettings()
  useTheme(uiSettings)

  useEffect(() => {
    getSocket()
  }, [])

  return (
    <>
      <DashboardLayout>
        {view === 'settings' ? <SettingsPanel /> : <Dashboard />}
      </DashboardLayout>
      <ToastContainer />
    </>
  )
}

export default App
