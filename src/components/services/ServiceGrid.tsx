import { memo } from 'react'
import { AnimatePresence, motion } from 'framer-motion'
import { useHideService, useServices } from '../../api/hooks/useServices'
import { ServiceTile } from './ServiceTile'

export const ServiceGrid = memo(function ServiceGrid() {
  const { data, isLoading, error } = useServices()
  const hide = useHideService()

  if (isLoading) {
    return (
      <div className="flex items-center justify-center h-32 opacity-70">
        <div className="animate-spin w-6 h-6 border-2 border-dock-accent border-t-transparent rounded-full" />
        <span className="ml-2">Discovering services...</span>
      </div>
    )
  }

  if (error) {
    return (
      <div className="p-4 bg-signal-red/10 border border-signal-red/30 rounded-tile text-signal-red">
        Error loading services: {error.message}
      </div>
    )
  }

  if (data && !data.sourceAvailable) {
    return (
      <div className="p-4 bg-signal-yellow/10 border border-signal-yellow/30 rounded-tile text-signal-yellow">
        <div className="font-bold mb-1">Docker is not reachable</div>
        <div className="dock-small opacity-80">
          Check that the Docker socket is mounted into the dashboard container. Services will appear once it
          answers again.
        </div>
      </div>
    )
  }

  if (!data?.services.length) {
    return (
      <div className="dock-panel p-6 text-center opacity-70">
        <div className="dock-title mb-2">No services to show</div>
        <div className="dock-small">
          Containers appear here once they run. Hidden services can be shown again from Settings.
        </div>
      </div>
    )
  }

  return (
    <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-3 xl:grid-cols-4 gap-4">
      <AnimatePresence mode="popLayout">
        {data.services.map((service) => (
          <motion.div
            key={service.id}
            layout
            initial={{ opacity: 0, scale: 0.95 }}
            animate={{ opacity: 1, scale: 1 }}
            exit={{ opacity: 0, scale: 0.95 }}
            transition={{ duration: 0.15 }}
          >
            <ServiceTile
              service={service}
              onHide={(s) => hide.mutate(s)}
              isHiding={hide.isPending && hide.variables?.id === service.id}
            />
          </motion.div>
        ))}
      </AnimatePresence>
    </div>
  )
})
